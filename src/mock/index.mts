export * from "./extensions/broker.service.mts";
export * from "./mock-mqtt.module.mts";
