import type { TServiceParams } from "@digital-alchemy/core";

import { compileValueTemplate, type TemplateContext } from "../helpers/index.mts";

export function TemplateService({ logger, mqtt_binary_sensor }: TServiceParams) {
  const context: TemplateContext = {
    logger,
    states: entity_id => mqtt_binary_sensor.entity.getState(entity_id)?.state,
  };

  return {
    compile: (source: string) => compileValueTemplate(source, context),
  };
}
