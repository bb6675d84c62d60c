import type { TServiceParams } from "@digital-alchemy/core";
import { connect, type MqttClient } from "mqtt";
import mqttMatch from "mqtt-match";
import { v4 } from "uuid";

import {
  type MessageCallback,
  type QoS,
  subscribeTopics,
  type SubscriptionState,
  type TopicSpecMap,
  type TopicSubscriber,
  type Unsubscriber,
  unsubscribeTopics,
} from "../helpers/index.mts";

/**
 * The slice of a broker connection the transport needs
 */
export interface MqttConnection {
  subscribe(topic: string, qos: QoS): void;
  unsubscribe(topic: string): void;
  onMessage(callback: MessageCallback): void;
  end(): Promise<void>;
}

type FilterSubscription = {
  qos: QoS;
  callbacks: Set<MessageCallback>;
};

export function TransportService({ logger, lifecycle, config }: TServiceParams) {
  const filters = new Map<string, FilterSubscription>();
  let connection: MqttConnection | undefined;

  // #MARK: dispatch
  function dispatch(topic: string, payload: string, qos: QoS) {
    filters.forEach(({ callbacks }, filter) => {
      if (!mqttMatch(filter, topic)) {
        return;
      }
      [...callbacks].forEach(callback => {
        try {
          callback(topic, payload, qos);
        } catch (error) {
          logger.error({ error, filter, topic }, "message handler failed");
        }
      });
    });
  }

  // #MARK: wrapClient
  function wrapClient(client: MqttClient, name: string): MqttConnection {
    client.on("connect", () => logger.debug({ name }, "connected"));
    client.on("reconnect", () => logger.debug({ name }, "reconnecting"));
    client.on("offline", () => logger.warn({ name }, "offline"));
    client.on("error", error => logger.error({ error, name }, "connection error"));

    return {
      async end() {
        await client.endAsync();
        logger.debug({ name }, "destroyed");
      },
      onMessage(callback) {
        client.on("message", (topic, payload, packet) =>
          callback(topic, payload.toString("utf8"), packet.qos),
        );
      },
      subscribe(topic, qos) {
        client.subscribe(topic, { qos }, error => {
          if (error) {
            logger.error({ error, topic }, "subscribe failed");
          }
        });
      },
      unsubscribe(topic) {
        client.unsubscribe(topic);
      },
    };
  }

  /**
   * Swap in a connection before the library connects on its own (in-process broker for tests)
   */
  function useConnection(next: MqttConnection) {
    connection = next;
    next.onMessage(dispatch);
    filters.forEach(({ qos }, topic) => next.subscribe(topic, qos));
  }

  lifecycle.onPostConfig(() => {
    if (connection) {
      logger.debug("connection provided, not connecting");
      return;
    }
    const { MQTT_URL, MQTT_USERNAME, MQTT_PASSWORD, CLIENT_ID_PREFIX } = config.mqtt_binary_sensor;
    const clientId = `${CLIENT_ID_PREFIX}_${v4().slice(0, 8)}`;
    logger.info({ clientId, url: MQTT_URL }, "connecting to broker");
    useConnection(
      wrapClient(
        connect(MQTT_URL, { clientId, password: MQTT_PASSWORD, username: MQTT_USERNAME }),
        clientId,
      ),
    );
  });

  lifecycle.onShutdownStart(async () => {
    if (!connection) {
      return;
    }
    const current = connection;
    connection = undefined;
    await current.end();
  });

  // #MARK: subscribe
  function subscribe(topic: string, callback: MessageCallback, qos: QoS): Unsubscriber {
    const existing = filters.get(topic);
    if (existing) {
      existing.callbacks.add(callback);
      if (qos > existing.qos) {
        existing.qos = qos;
        connection?.subscribe(topic, qos);
      }
    } else {
      filters.set(topic, { callbacks: new Set([callback]), qos });
      logger.trace({ qos, topic }, "subscribe");
      connection?.subscribe(topic, qos);
    }

    let active = true;
    return () => {
      if (!active) {
        return;
      }
      active = false;
      const current = filters.get(topic);
      if (!current) {
        return;
      }
      current.callbacks.delete(callback);
      if (current.callbacks.size === 0) {
        filters.delete(topic);
        logger.trace({ topic }, "unsubscribe");
        connection?.unsubscribe(topic);
      }
    };
  }

  const subscriber: TopicSubscriber = { subscribe };

  return {
    /**
     * Active topic filters, with local subscriber counts
     */
    filters: () =>
      [...filters.entries()].map(([topic, { qos, callbacks }]) => ({
        qos,
        subscribers: callbacks.size,
        topic,
      })),
    subscribe,
    subscribeTopics: (previous: SubscriptionState | undefined, topics: TopicSpecMap) =>
      subscribeTopics(subscriber, previous, topics),
    unsubscribeTopics,
    useConnection,
  };
}
