import { CreateLibrary, type InternalConfig } from "@digital-alchemy/core";

import type { BinarySensorInput } from "./helpers/index.mts";
import {
  BinarySensorPlatform,
  DiscoveryService,
  EntityService,
  TemplateService,
  TransportService,
} from "./services/index.mts";

export const LIB_MQTT_BINARY_SENSOR = CreateLibrary({
  configuration: {
    CLIENT_ID_PREFIX: {
      default: "mqtt_binary_sensor",
      description: "Broker client id prefix, a random suffix is appended per connection",
      type: "string",
    },
    DEFAULT_QOS: {
      default: 0,
      description: "QoS for sensors that do not declare one (0, 1, 2)",
      type: "number",
    },
    DISCOVERY: {
      default: true,
      description: "Create sensors from discovery messages published under DISCOVERY_PREFIX",
      type: "boolean",
    },
    DISCOVERY_PREFIX: {
      default: "homeassistant",
      description: [
        "Topic prefix for discovery messages",
        "<prefix>/binary_sensor/[<node_id>/]<object_id>/config",
      ],
      type: "string",
    },
    MQTT_PASSWORD: {
      description: "Broker password",
      type: "string",
    },
    MQTT_URL: {
      default: "mqtt://localhost:1883",
      description: "Broker connection url",
      type: "string",
    },
    MQTT_USERNAME: {
      description: "Broker username",
      type: "string",
    },
    SENSORS: {
      default: [],
      description: "Statically configured binary sensors, set up at bootstrap",
      type: "internal",
    } as InternalConfig<BinarySensorInput[]>,
  },
  name: "mqtt_binary_sensor",
  priorityInit: ["transport", "entity"],
  services: {
    /**
     * Sensor platform: static + discovered sensor setup
     */
    binary_sensor: BinarySensorPlatform,

    /**
     * @internal
     *
     * Discovery topic listener, routes follow-up messages to entities
     */
    discovery: DiscoveryService,

    /**
     * Entity registry, displayed state + change events
     */
    entity: EntityService,

    /**
     * @internal
     *
     * Value template compiler, bound to the entity registry
     */
    template: TemplateService,

    /**
     * Broker connection, shared by all subscriptions
     */
    transport: TransportService,
  },
});

declare module "@digital-alchemy/core" {
  export interface LoadedModules {
    /**
     * binary sensors driven by mqtt state topics
     */
    mqtt_binary_sensor: typeof LIB_MQTT_BINARY_SENSOR;
  }
}
