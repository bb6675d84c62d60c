import { CreateLibrary, createModule } from "@digital-alchemy/core";

import { LIB_MQTT_BINARY_SENSOR } from "../mqtt-binary-sensor.module.mts";
import { MockBroker } from "./extensions/broker.service.mts";

export const LIB_MOCK_MQTT = CreateLibrary({
  configuration: {
    INSTALL_BROKER: {
      default: true,
      description: "Replace the network connection with the in-process broker",
      type: "boolean",
    },
  },
  depends: [LIB_MQTT_BINARY_SENSOR],
  name: "mock_mqtt",
  priorityInit: [],
  services: {
    broker: MockBroker,
  },
});

declare module "@digital-alchemy/core" {
  export interface LoadedModules {
    mock_mqtt: typeof LIB_MOCK_MQTT;
  }
}

/**
 * Fresh runner per call, configuration does not carry over between tests
 */
export const createMqttTestRunner = () =>
  createModule
    .fromLibrary(LIB_MQTT_BINARY_SENSOR)
    .extend()
    .toTest()
    .setOptions({ configSources: { argv: false, env: false, file: false } })
    .appendLibrary(LIB_MOCK_MQTT);
