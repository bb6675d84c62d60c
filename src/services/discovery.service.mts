import type { TServiceParams } from "@digital-alchemy/core";

import {
  type DiscoveryDispatcher,
  type DiscoveryHash,
  type DiscoveryPayload,
  type DiscoveryUpdateCallback,
  hashKey,
  type Unsubscriber,
} from "../helpers/index.mts";
import { ENTITY_DOMAIN } from "./entity.service.mts";

const TOPIC_BASE = "~";
const DISCOVERY_PLATFORM = "mqtt";
const LEVEL = /^[\w-]+$/;

/**
 * Short keys devices may use in discovery payloads
 */
export const ABBREVIATIONS: Readonly<Record<string, string>> = {
  avty_t: "availability_topic",
  dev: "device",
  dev_cla: "device_class",
  frc_upd: "force_update",
  off_dly: "off_delay",
  pl_avail: "payload_available",
  pl_not_avail: "payload_not_available",
  pl_off: "payload_off",
  pl_on: "payload_on",
  stat_t: "state_topic",
  uniq_id: "unique_id",
  val_tpl: "value_template",
};

export const DEVICE_ABBREVIATIONS: Readonly<Record<string, string>> = {
  cns: "connections",
  ids: "identifiers",
  mdl: "model",
  mf: "manufacturer",
  name: "name",
  sw: "sw_version",
};

const isPayloadObject = (value: unknown): value is DiscoveryPayload =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expandKeys = (payload: DiscoveryPayload, map: Readonly<Record<string, string>>) =>
  Object.fromEntries(
    Object.entries(payload).map(([key, value]) => [map[key] ?? key, value] as const),
  );

/**
 * Expand abbreviations + substitute the `~` base topic
 */
export function expandDiscoveryPayload(payload: DiscoveryPayload): DiscoveryPayload {
  const out = expandKeys(payload, ABBREVIATIONS);
  if (isPayloadObject(out.device)) {
    out.device = expandKeys(out.device, DEVICE_ABBREVIATIONS);
  }
  const base = out[TOPIC_BASE];
  if (typeof base === "string") {
    Object.entries(out).forEach(([key, value]) => {
      if (!key.endsWith("_topic") || typeof value !== "string") {
        return;
      }
      if (value.startsWith(TOPIC_BASE)) {
        out[key] = base + value.slice(TOPIC_BASE.length);
      } else if (value.endsWith(TOPIC_BASE)) {
        out[key] = value.slice(0, -TOPIC_BASE.length) + base;
      }
    });
    delete out[TOPIC_BASE];
  }
  return out;
}

/**
 * `<prefix>/<component>/[<node_id>/]<object_id>/config` → discovery hash
 */
export function parseDiscoveryTopic(prefix: string, topic: string): DiscoveryHash | undefined {
  if (!topic.startsWith(`${prefix}/`)) {
    return undefined;
  }
  const levels = topic.slice(prefix.length + 1).split("/");
  if (levels.at(-1) !== "config" || !levels.slice(0, -1).every(level => LEVEL.test(level))) {
    return undefined;
  }
  if (levels.length === 3) {
    return [levels[0], levels[1]];
  }
  if (levels.length === 4) {
    return [levels[0], `${levels[1]} ${levels[2]}`];
  }
  return undefined;
}

export function DiscoveryService({
  logger,
  lifecycle,
  config,
  mqtt_binary_sensor,
}: TServiceParams) {
  const listeners = new Map<string, DiscoveryUpdateCallback>();
  const known = new Set<string>();
  const subscriptions: Unsubscriber[] = [];

  // #MARK: listen
  function listen(hash: DiscoveryHash, callback: DiscoveryUpdateCallback): Unsubscriber {
    const key = hashKey(hash);
    listeners.set(key, callback);
    return () => {
      if (listeners.get(key) === callback) {
        listeners.delete(key);
      }
    };
  }

  function decode(topic: string, payload: string): DiscoveryPayload | undefined {
    if (payload === "") {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      logger.warn({ error, topic }, "unable to parse discovery payload: '%s'", payload);
      return undefined;
    }
    if (!isPayloadObject(parsed)) {
      logger.warn({ topic }, "discovery payload is not an object: '%s'", payload);
      return undefined;
    }
    return expandDiscoveryPayload(parsed);
  }

  // #MARK: onDiscoveryMessage
  function onDiscoveryMessage(topic: string, raw: string) {
    const hash = parseDiscoveryTopic(config.mqtt_binary_sensor.DISCOVERY_PREFIX, topic);
    if (!hash || hash[0] !== ENTITY_DOMAIN) {
      return;
    }
    const payload = decode(topic, raw);
    if (!payload) {
      return;
    }
    const key = hashKey(hash);
    const empty = Object.keys(payload).length === 0;

    if (known.has(key)) {
      logger.debug({ discovery_hash: hash, empty }, "discovery update for known entity");
      if (empty) {
        known.delete(key);
      }
      try {
        listeners.get(key)?.(payload);
      } catch (error) {
        logger.error({ discovery_hash: hash, error }, "discovery update rejected");
      }
      return;
    }
    if (empty) {
      return;
    }
    const platform = payload.platform ?? DISCOVERY_PLATFORM;
    if (platform !== DISCOVERY_PLATFORM) {
      logger.warn({ discovery_hash: hash, platform }, "integration is not supported");
      return;
    }

    known.add(key);
    try {
      if (!mqtt_binary_sensor.binary_sensor.setupFromDiscovery(payload, hash)) {
        known.delete(key);
      }
    } catch (error) {
      known.delete(key);
      logger.error({ discovery_hash: hash, error }, "invalid discovery payload");
    }
  }

  lifecycle.onBootstrap(() => {
    const { DISCOVERY, DISCOVERY_PREFIX } = config.mqtt_binary_sensor;
    if (!DISCOVERY) {
      logger.debug("discovery disabled");
      return;
    }
    const topics = [
      `${DISCOVERY_PREFIX}/${ENTITY_DOMAIN}/+/config`,
      `${DISCOVERY_PREFIX}/${ENTITY_DOMAIN}/+/+/config`,
    ];
    topics.forEach(topic => {
      logger.debug({ topic }, "listening for discovery");
      subscriptions.push(mqtt_binary_sensor.transport.subscribe(topic, onDiscoveryMessage, 0));
    });
  });

  lifecycle.onPreShutdown(() => {
    subscriptions.splice(0).forEach(remove => remove());
  });

  const dispatcher: DiscoveryDispatcher = { listen };

  return {
    ...dispatcher,
    /**
     * Hashes that currently have an entity set up
     */
    known: () => [...known],
    onDiscoveryMessage,
  };
}
