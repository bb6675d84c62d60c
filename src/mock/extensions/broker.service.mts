import type { TServiceParams } from "@digital-alchemy/core";
import mqttMatch from "mqtt-match";

import type { MessageCallback, QoS } from "../../helpers/index.mts";
import type { MqttConnection } from "../../services/index.mts";

export type PublishOptions = {
  qos?: QoS;
};

type InMemoryClient = {
  filters: Map<string, QoS>;
  handlers: MessageCallback[];
  connected: boolean;
};

/**
 * In-process broker, stands in for the network connection during tests
 */
export function MockBroker({ logger, lifecycle, config, mqtt_binary_sensor }: TServiceParams) {
  const clients = new Set<InMemoryClient>();
  const published: { topic: string; payload: string }[] = [];

  // #MARK: connect
  function connect(): MqttConnection {
    const client: InMemoryClient = { connected: true, filters: new Map(), handlers: [] };
    clients.add(client);
    return {
      async end() {
        client.connected = false;
        clients.delete(client);
      },
      onMessage(callback) {
        client.handlers.push(callback);
      },
      subscribe(topic, qos) {
        client.filters.set(topic, qos);
      },
      unsubscribe(topic) {
        client.filters.delete(topic);
      },
    };
  }

  // #MARK: publish
  /**
   * Deliver to every connection with a matching filter, once per connection
   */
  function publish(topic: string, payload: string | object, { qos = 0 }: PublishOptions = {}) {
    const message = typeof payload === "string" ? payload : JSON.stringify(payload);
    published.push({ payload: message, topic });
    logger.trace({ topic }, "publish");
    clients.forEach(client => {
      const matched = [...client.filters.keys()].some(filter => mqttMatch(filter, topic));
      if (matched && client.connected) {
        client.handlers.forEach(handler => handler(topic, message, qos));
      }
    });
  }

  lifecycle.onPreInit(() => {
    if (!config.mock_mqtt.INSTALL_BROKER) {
      return;
    }
    mqtt_binary_sensor.transport.useConnection(connect());
  });

  return {
    connect,
    /**
     * Topic filters subscribed at the broker, across connections
     */
    filters: () => [...clients].flatMap(client => [...client.filters.keys()]),
    publish,
    published: () => [...published],
  };
}
