import type { TServiceParams } from "@digital-alchemy/core";

export type QoS = 0 | 1 | 2;

/**
 * Sensor value as last derived from the state topic.
 *
 * `unknown` until the first matching message arrives
 */
export type SensorState = "unknown" | "on" | "off";

/**
 * What the host displays, availability folded in
 */
export type DisplayState = SensorState | "unavailable";

export type Unsubscriber = () => void;

export type MessageCallback = (topic: string, payload: string, qos: QoS) => void;

export interface TopicSubscriber {
  /**
   * Register `callback` for every message matching the topic filter.
   *
   * The returned function removes this registration only
   */
  subscribe(topic: string, callback: MessageCallback, qos: QoS): Unsubscriber;
}

export type CancelTimer = () => void;

/**
 * One-shot timer, returns a cancel function
 */
export type DelayScheduler = (callback: () => void, seconds: number) => CancelTimer;

export type SensorLogger = Pick<
  TServiceParams["logger"],
  "trace" | "debug" | "info" | "warn" | "error"
>;

/**
 * Raw payload in, derived payload out
 */
export type ValueTemplate = (payload: string) => string;

/**
 * `[component, discovery_id]`
 *
 * `discovery_id` is `object_id`, or `"node_id object_id"` when the discovery topic has a node level
 */
export type DiscoveryHash = readonly [component: string, discovery_id: string];

export type DiscoveryPayload = Record<string, unknown>;

export const hashKey = ([component, discovery_id]: DiscoveryHash) =>
  `${component}:${discovery_id}`;

export type HassDeviceInfo = {
  identifiers?: [domain: string, id: string][];
  connections?: [type: string, value: string][];
  manufacturer?: string;
  model?: string;
  name?: string;
  sw_version?: string;
};

/**
 * The surface the entity registry works against
 */
export interface HostEntity {
  readonly name: string;
  readonly unique_id: string | undefined;
  readonly device_class: string | undefined;
  readonly force_update: boolean;
  readonly should_poll: false;
  readonly available: boolean;
  readonly state: SensorState;
  readonly device_info: HassDeviceInfo | undefined;
  onAdded(): void;
  onRemoved(): void;
}

export interface EntityHost {
  /**
   * Recalculate the displayed state, emitting when it changed (or `force_update` is set)
   */
  scheduleUpdate(entity: HostEntity): void;
  remove(entity: HostEntity): void;
}

export class MqttSensorConfigError extends Error {
  constructor(
    public issues: string[],
    message = `invalid configuration: ${issues.join("; ")}`,
  ) {
    super(message);
    this.name = "MqttSensorConfigError";
  }
}

export class MqttSensorTemplateError extends Error {
  constructor(
    public source: string,
    message: string,
  ) {
    super(`${message} in template: ${source}`);
    this.name = "MqttSensorTemplateError";
  }
}

export const formatObjectId = (input: string) =>
  input
    .trim()
    .toLowerCase()
    .replaceAll(/[^\d_a-z]+/g, "_")
    .replaceAll(/^_+|_+$/g, "")
    .replaceAll(/_+/g, "_");

export const toQoS = (value: number): QoS => (value === 1 || value === 2 ? value : 0);
