import { SECOND, type TServiceParams } from "@digital-alchemy/core";

import {
  type BinarySensorInput,
  type BinarySensorSettings,
  buildSettings,
  type DelayScheduler,
  type DiscoveryHash,
  type DiscoveryPayload,
  MqttBinarySensor,
  parsePlatformConfig,
} from "../../helpers/index.mts";

export function BinarySensorPlatform({
  logger,
  lifecycle,
  config,
  scheduler,
  mqtt_binary_sensor,
}: TServiceParams) {
  const scheduleOffDelay: DelayScheduler = (callback, seconds) => {
    const remove = scheduler.setTimeout(callback, seconds * SECOND);
    return () => remove();
  };

  /**
   * Validate raw config, then bind the value template to the host
   */
  function resolve(input: unknown): BinarySensorSettings {
    return buildSettings(parsePlatformConfig(input), {
      compile: mqtt_binary_sensor.template.compile,
      default_qos: config.mqtt_binary_sensor.DEFAULT_QOS,
    });
  }

  function create(settings: BinarySensorSettings, discovery_hash?: DiscoveryHash) {
    const entity = new MqttBinarySensor(
      settings,
      {
        discovery: mqtt_binary_sensor.discovery,
        host: mqtt_binary_sensor.entity.host,
        logger,
        resolve,
        scheduleOffDelay,
        transport: mqtt_binary_sensor.transport,
      },
      discovery_hash,
    );
    return mqtt_binary_sensor.entity.add(entity) === undefined ? undefined : entity;
  }

  // #MARK: setupFromStaticConfig
  function setupFromStaticConfig(input: BinarySensorInput) {
    return create(resolve(input));
  }

  // #MARK: setupFromDiscovery
  function setupFromDiscovery(payload: DiscoveryPayload, discovery_hash: DiscoveryHash) {
    logger.debug({ discovery_hash }, "discovered binary sensor");
    return create(resolve(payload), discovery_hash);
  }

  lifecycle.onBootstrap(() => {
    const { SENSORS } = config.mqtt_binary_sensor;
    logger.debug({ count: SENSORS.length }, "loading configured sensors");
    SENSORS.forEach(sensor => setupFromStaticConfig(sensor));
  });

  return {
    resolve,
    setupFromDiscovery,
    setupFromStaticConfig,
  };
}
