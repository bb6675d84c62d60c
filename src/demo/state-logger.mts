import type { TServiceParams } from "@digital-alchemy/core";

export function DemoStateLogger({ lifecycle, logger, mqtt_binary_sensor }: TServiceParams) {
  lifecycle.onReady(() => {
    logger.info({ entities: mqtt_binary_sensor.entity.list() }, "demo ready");
    mqtt_binary_sensor.entity.onStateChanged(({ entity_id, new_state, old_state }) => {
      logger.info(
        { from: old_state?.state, to: new_state?.state ?? "removed" },
        "[%s] state changed",
        entity_id,
      );
    });
  });
}
