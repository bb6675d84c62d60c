import { CreateApplication } from "@digital-alchemy/core";

import { LIB_MQTT_BINARY_SENSOR } from "../mqtt-binary-sensor.module.mts";
import { DemoStateLogger } from "./state-logger.mts";

export const DEMO_APP = CreateApplication({
  libraries: [LIB_MQTT_BINARY_SENSOR],
  name: "mqtt_binary_sensor_demo",
  services: {
    state_logger: DemoStateLogger,
  },
});

declare module "@digital-alchemy/core" {
  export interface LoadedModules {
    mqtt_binary_sensor_demo: typeof DEMO_APP;
  }
}

await DEMO_APP.bootstrap({
  configuration: {
    boilerplate: { LOG_LEVEL: "debug" },
    mqtt_binary_sensor: {
      SENSORS: [
        {
          device_class: "motion",
          name: "Hallway Motion",
          off_delay: 30,
          state_topic: "demo/hallway/motion",
        },
        {
          availability_topic: "demo/garage/status",
          device_class: "garage_door",
          name: "Garage Door",
          payload_off: "closed",
          payload_on: "open",
          state_topic: "demo/garage/state",
          value_template: "{{ value_json.door }}",
        },
      ],
    },
  },
});
