export * from "./availability.mts";
export * from "./binary-sensor.mts";
export * from "./config.mts";
export * from "./device-info.mts";
export * from "./discovery-update.mts";
export * from "./subscription.mts";
export * from "./template.mts";
export * from "./utility.mts";
