import { AvailabilityTracker } from "./availability.mts";
import type { BinarySensorDeviceClass, BinarySensorSettings } from "./config.mts";
import { DeviceInfoHolder } from "./device-info.mts";
import { type DiscoveryDispatcher, DiscoveryUpdatable } from "./discovery-update.mts";
import { subscribeTopics, type SubscriptionState, unsubscribeTopics } from "./subscription.mts";
import type {
  CancelTimer,
  DelayScheduler,
  DiscoveryHash,
  DiscoveryPayload,
  EntityHost,
  HassDeviceInfo,
  HostEntity,
  QoS,
  SensorLogger,
  SensorState,
  TopicSubscriber,
} from "./utility.mts";

export type BinarySensorDependencies = {
  logger: SensorLogger;
  transport: TopicSubscriber;
  scheduleOffDelay: DelayScheduler;
  host: EntityHost;
  /**
   * Validate a discovery payload + bind collaborators
   */
  resolve: (payload: DiscoveryPayload) => BinarySensorSettings;
  discovery?: DiscoveryDispatcher;
};

/**
 * Binary sensor driven by messages on a state topic.
 *
 * Each matching message sets the state, unmatched payloads are logged and dropped.
 * With `off_delay`, an `on` state reverts to `off` after that many seconds unless a newer message arrives first.
 */
export class MqttBinarySensor implements HostEntity {
  readonly should_poll = false;
  readonly availability: AvailabilityTracker;
  readonly device: DeviceInfoHolder;
  readonly discovery: DiscoveryUpdatable;

  private settings: BinarySensorSettings;
  private currentState: SensorState = "unknown";
  private subscription: SubscriptionState | undefined;
  private pendingOffTimer: CancelTimer | undefined;

  constructor(
    settings: BinarySensorSettings,
    private readonly dependencies: BinarySensorDependencies,
    discovery_hash?: DiscoveryHash,
  ) {
    this.settings = settings;
    this.availability = new AvailabilityTracker(
      dependencies.transport,
      settings.availability,
      () => dependencies.host.scheduleUpdate(this),
    );
    this.device = new DeviceInfoHolder(settings.device);
    this.discovery = new DiscoveryUpdatable(
      discovery_hash,
      payload => this.discoveryUpdate(payload),
      () => dependencies.host.remove(this),
    );
  }

  // #MARK: lifecycle
  onAdded(): void {
    this.availability.activate();
    this.discovery.activate(this.dependencies.discovery);
    this.activate();
  }

  onRemoved(): void {
    this.deactivate();
    this.discovery.deactivate();
  }

  /**
   * Overwrite config, state + subscriptions are left alone
   */
  configure(settings: BinarySensorSettings): void {
    this.settings = settings;
    this.device.update(settings.device);
  }

  /**
   * (Re)subscribe the state topic, replacing any previous subscription
   */
  activate(): void {
    const { state_topic, qos } = this.settings;
    this.dependencies.logger.trace({ name: this.name, state_topic }, "subscribe state topic");
    this.subscription = subscribeTopics(this.dependencies.transport, this.subscription, {
      state_topic: { msg_callback: this.onMessage, qos, topic: state_topic },
    });
  }

  deactivate(): void {
    this.subscription = unsubscribeTopics(this.subscription);
    this.cancelOffTimer();
    this.availability.deactivate();
  }

  discoveryUpdate(payload: DiscoveryPayload): void {
    const settings = this.dependencies.resolve(payload);
    this.dependencies.logger.debug({ name: this.name }, "discovery update");
    this.configure(settings);
    this.availability.discoveryUpdate(settings.availability);
    this.activate();
    this.dependencies.host.scheduleUpdate(this);
  }

  // #MARK: onMessage
  readonly onMessage = (topic: string, rawPayload: string, _qos: QoS): void => {
    const { value_template, payload_on, payload_off, off_delay } = this.settings;
    const payload = value_template ? value_template(rawPayload) : rawPayload;

    if (payload === payload_on) {
      this.currentState = "on";
    } else if (payload === payload_off) {
      this.currentState = "off";
    } else {
      this.dependencies.logger.warn(
        { payload, topic },
        "No matching payload found for entity: %s with state_topic: %s",
        this.name,
        this.settings.state_topic,
      );
      return;
    }

    this.cancelOffTimer();
    if (this.currentState === "on" && off_delay !== undefined) {
      this.pendingOffTimer = this.dependencies.scheduleOffDelay(this.onOffDelayExpired, off_delay);
    }
    this.dependencies.host.scheduleUpdate(this);
  };

  // #MARK: onOffDelayExpired
  readonly onOffDelayExpired = (): void => {
    this.pendingOffTimer = undefined;
    this.currentState = "off";
    this.dependencies.host.scheduleUpdate(this);
  };

  private cancelOffTimer(): void {
    this.pendingOffTimer?.();
    this.pendingOffTimer = undefined;
  }

  // #MARK: properties
  get state(): SensorState {
    return this.currentState;
  }

  /**
   * `undefined` until the first matching message
   */
  get is_on(): boolean | undefined {
    return this.currentState === "unknown" ? undefined : this.currentState === "on";
  }

  get name(): string {
    return this.settings.name;
  }

  get state_topic(): string {
    return this.settings.state_topic;
  }

  get device_class(): BinarySensorDeviceClass | undefined {
    return this.settings.device_class;
  }

  get force_update(): boolean {
    return this.settings.force_update;
  }

  get unique_id(): string | undefined {
    return this.settings.unique_id;
  }

  get available(): boolean {
    return this.availability.available;
  }

  get device_info(): HassDeviceInfo | undefined {
    return this.device.device_info;
  }

  get has_pending_off_timer(): boolean {
    return this.pendingOffTimer !== undefined;
  }
}
