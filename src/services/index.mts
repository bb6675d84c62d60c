export * from "./discovery.service.mts";
export * from "./domains/binary-sensor.service.mts";
export * from "./entity.service.mts";
export * from "./template.service.mts";
export * from "./transport.service.mts";
