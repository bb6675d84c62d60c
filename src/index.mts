export * from "./helpers/index.mts";
export * from "./mqtt-binary-sensor.module.mts";
export * from "./services/index.mts";
