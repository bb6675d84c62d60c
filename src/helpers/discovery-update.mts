import type { DiscoveryHash, DiscoveryPayload, Unsubscriber } from "./utility.mts";

export type DiscoveryUpdateCallback = (payload: DiscoveryPayload) => void;

export interface DiscoveryDispatcher {
  /**
   * Receive follow-up discovery messages for a hash
   */
  listen(hash: DiscoveryHash, callback: DiscoveryUpdateCallback): Unsubscriber;
}

/**
 * Routes follow-up discovery messages to an entity.
 *
 * An empty payload means the device withdrew the entity.
 */
export class DiscoveryUpdatable {
  private remove: Unsubscriber | undefined;

  constructor(
    readonly discovery_hash: DiscoveryHash | undefined,
    private readonly onUpdate: DiscoveryUpdateCallback,
    private readonly onWithdraw: () => void,
  ) {}

  activate(dispatcher: DiscoveryDispatcher | undefined): void {
    if (!this.discovery_hash || !dispatcher) {
      return;
    }
    this.remove?.();
    this.remove = dispatcher.listen(this.discovery_hash, this.onMessage);
  }

  deactivate(): void {
    this.remove?.();
    this.remove = undefined;
  }

  readonly onMessage = (payload: DiscoveryPayload): void => {
    if (Object.keys(payload).length === 0) {
      this.onWithdraw();
      return;
    }
    this.onUpdate(payload);
  };
}
