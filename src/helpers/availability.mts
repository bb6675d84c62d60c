import { subscribeTopics, type SubscriptionState, unsubscribeTopics } from "./subscription.mts";
import type { QoS, TopicSubscriber } from "./utility.mts";

export type AvailabilityConfig = {
  availability_topic?: string;
  payload_available: string;
  payload_not_available: string;
  qos: QoS;
};

/**
 * Tracks device reachability from an optional availability topic.
 *
 * Without a topic the entity is always available.
 * With one, it starts unavailable until the device reports in.
 */
export class AvailabilityTracker {
  private subscription: SubscriptionState | undefined;
  private reported: boolean;

  constructor(
    private readonly transport: TopicSubscriber,
    private config: AvailabilityConfig,
    private readonly onChange: () => void,
  ) {
    this.reported = config.availability_topic === undefined;
  }

  get available(): boolean {
    return this.config.availability_topic === undefined || this.reported;
  }

  activate(): void {
    const { availability_topic, qos } = this.config;
    if (availability_topic === undefined) {
      this.subscription = unsubscribeTopics(this.subscription);
      return;
    }
    this.subscription = subscribeTopics(this.transport, this.subscription, {
      availability_topic: { msg_callback: this.onMessage, qos, topic: availability_topic },
    });
  }

  discoveryUpdate(config: AvailabilityConfig): void {
    this.config = config;
    this.activate();
  }

  deactivate(): void {
    this.subscription = unsubscribeTopics(this.subscription);
  }

  readonly onMessage = (_topic: string, payload: string): void => {
    if (payload === this.config.payload_available) {
      this.reported = true;
    } else if (payload === this.config.payload_not_available) {
      this.reported = false;
    } else {
      return;
    }
    this.onChange();
  };
}
