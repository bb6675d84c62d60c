import { z } from "zod";

import type { AvailabilityConfig } from "./availability.mts";
import type { DeviceInfoConfig } from "./device-info.mts";
import { MqttSensorConfigError, type QoS, toQoS, type ValueTemplate } from "./utility.mts";

export const DEFAULT_NAME = "MQTT Binary sensor";
export const DEFAULT_PAYLOAD_ON = "ON";
export const DEFAULT_PAYLOAD_OFF = "OFF";
export const DEFAULT_PAYLOAD_AVAILABLE = "online";
export const DEFAULT_PAYLOAD_NOT_AVAILABLE = "offline";
export const DEFAULT_FORCE_UPDATE = false;

export const BINARY_SENSOR_DEVICE_CLASSES = [
  "battery",
  "cold",
  "connectivity",
  "door",
  "garage_door",
  "gas",
  "heat",
  "light",
  "lock",
  "moisture",
  "motion",
  "moving",
  "occupancy",
  "opening",
  "plug",
  "power",
  "presence",
  "problem",
  "safety",
  "smoke",
  "sound",
  "vibration",
  "window",
] as const;

export type BinarySensorDeviceClass = (typeof BINARY_SENSOR_DEVICE_CLASSES)[number];

/**
 * `+` must fill a whole level, `#` must be the last level
 */
export function isValidSubscribeTopic(topic: string): boolean {
  if (topic.length === 0 || topic.includes("\0")) {
    return false;
  }
  const levels = topic.split("/");
  return levels.every((level, index) => {
    if (level.includes("#")) {
      return level === "#" && index === levels.length - 1;
    }
    return !level.includes("+") || level === "+";
  });
}

const TRUE_STRINGS = new Set(["1", "true", "yes", "on", "enable"]);
const FALSE_STRINGS = new Set(["0", "false", "no", "off", "disable"]);

/**
 * Accepts booleans, numbers, and the usual yes/no spellings
 */
function toBoolean(value: unknown): unknown {
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_STRINGS.has(normalized)) {
    return true;
  }
  return FALSE_STRINGS.has(normalized) ? false : value;
}

/**
 * Whole-number strings parse, finite numbers truncate, everything else is left for the schema to reject
 */
function toInteger(value: unknown): unknown {
  if (typeof value === "boolean") {
    return Number(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : value;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return value;
}

const BOOLEAN_SCHEMA = z.preprocess(toBoolean, z.boolean());
const QOS_SCHEMA = z.preprocess(toInteger, z.union([z.literal(0), z.literal(1), z.literal(2)]));

// #MARK: DEVICE_INFO_SCHEMA
export const DEVICE_INFO_SCHEMA = z
  .object({
    connections: z.array(z.tuple([z.string(), z.string()])).default([]),
    identifiers: z
      .union([z.string(), z.array(z.string())])
      .default([])
      .transform(value => (typeof value === "string" ? [value] : value)),
    manufacturer: z.string().optional(),
    model: z.string().optional(),
    name: z.string().optional(),
    sw_version: z.string().optional(),
  })
  .refine(device => device.identifiers.length > 0 || device.connections.length > 0, {
    message: "Device must have at least one identifying value in 'identifiers' and/or 'connections'",
  });

// #MARK: AVAILABILITY_SCHEMA
export const AVAILABILITY_SCHEMA = z.object({
  availability_topic: z.string().refine(isValidSubscribeTopic, "invalid topic").optional(),
  payload_available: z.string().default(DEFAULT_PAYLOAD_AVAILABLE),
  payload_not_available: z.string().default(DEFAULT_PAYLOAD_NOT_AVAILABLE),
});

// #MARK: PLATFORM_SCHEMA
export const PLATFORM_SCHEMA = z
  .object({
    device: DEVICE_INFO_SCHEMA.optional(),
    device_class: z.enum(BINARY_SENSOR_DEVICE_CLASSES).optional(),
    force_update: BOOLEAN_SCHEMA.default(DEFAULT_FORCE_UPDATE),
    name: z.string().default(DEFAULT_NAME),
    off_delay: z.preprocess(toInteger, z.number().int().min(0)).optional(),
    payload_off: z.string().default(DEFAULT_PAYLOAD_OFF),
    payload_on: z.string().default(DEFAULT_PAYLOAD_ON),
    qos: QOS_SCHEMA.optional(),
    state_topic: z.string().refine(isValidSubscribeTopic, "invalid topic"),
    unique_id: z.string().optional(),
    value_template: z.string().optional(),
  })
  .merge(AVAILABILITY_SCHEMA);

/**
 * What a user (or a discovery message) provides
 */
export type BinarySensorInput = z.input<typeof PLATFORM_SCHEMA>;

/**
 * Validated config, defaults applied
 */
export type BinarySensorConfig = z.output<typeof PLATFORM_SCHEMA>;

/**
 * Validated config, with the collaborators it needs already bound
 */
export type BinarySensorSettings = {
  name: string;
  state_topic: string;
  payload_on: string;
  payload_off: string;
  device_class?: BinarySensorDeviceClass;
  qos: QoS;
  force_update: boolean;
  off_delay?: number;
  unique_id?: string;
  value_template?: ValueTemplate;
  availability: AvailabilityConfig;
  device?: DeviceInfoConfig;
};

export function parsePlatformConfig(input: unknown): BinarySensorConfig {
  const result = PLATFORM_SCHEMA.safeParse(input);
  if (result.success) {
    return result.data;
  }
  throw new MqttSensorConfigError(
    result.error.issues.map(({ path, message }) => `${path.join(".") || "(root)"}: ${message}`),
  );
}

export type BuildSettingsOptions = {
  default_qos: number;
  compile: (source: string) => ValueTemplate;
};

export function buildSettings(
  config: BinarySensorConfig,
  { default_qos, compile }: BuildSettingsOptions,
): BinarySensorSettings {
  const qos = config.qos ?? toQoS(default_qos);
  return {
    availability: {
      availability_topic: config.availability_topic,
      payload_available: config.payload_available,
      payload_not_available: config.payload_not_available,
      qos,
    },
    device: config.device,
    device_class: config.device_class,
    force_update: config.force_update,
    name: config.name,
    off_delay: config.off_delay,
    payload_off: config.payload_off,
    payload_on: config.payload_on,
    qos,
    state_topic: config.state_topic,
    unique_id: config.unique_id,
    value_template:
      config.value_template === undefined ? undefined : compile(config.value_template),
  };
}
