import { InternalError, type TServiceParams } from "@digital-alchemy/core";
import dayjs from "dayjs";

import {
  type DisplayState,
  type EntityHost,
  formatObjectId,
  type HostEntity,
  type Unsubscriber,
} from "../helpers/index.mts";

export const ENTITY_DOMAIN = "binary_sensor";
export const EVENT_STATE_CHANGED = "mqtt_binary_sensor/state_changed";

export type EntityAttributes = {
  friendly_name: string;
  device_class?: string;
};

export type EntityStateRecord = {
  entity_id: string;
  state: DisplayState;
  attributes: EntityAttributes;
  last_changed: string;
  last_updated: string;
};

export type StateChangedEvent = {
  entity_id: string;
  old_state: EntityStateRecord | undefined;
  new_state: EntityStateRecord | undefined;
};

/**
 * Host side of the entity lifecycle: ids, displayed state, change notifications
 */
export function EntityService({ logger, lifecycle, event, context }: TServiceParams) {
  const entities = new Map<string, HostEntity>();
  const entityIds = new Map<HostEntity, string>();
  const uniqueIds = new Set<string>();
  const states = new Map<string, EntityStateRecord>();

  function nextEntityId(name: string) {
    const object_id = formatObjectId(name) || ENTITY_DOMAIN;
    let entity_id = `${ENTITY_DOMAIN}.${object_id}`;
    for (let suffix = 2; entities.has(entity_id); suffix++) {
      entity_id = `${ENTITY_DOMAIN}.${object_id}_${suffix}`;
    }
    return entity_id;
  }

  function attributesFor(entity: HostEntity): EntityAttributes {
    const attributes: EntityAttributes = { friendly_name: entity.name };
    if (entity.device_class) {
      attributes.device_class = entity.device_class;
    }
    return attributes;
  }

  const sameAttributes = (a: EntityAttributes, b: EntityAttributes) =>
    a.friendly_name === b.friendly_name && a.device_class === b.device_class;

  // #MARK: scheduleUpdate
  function scheduleUpdate(entity: HostEntity) {
    const entity_id = entityIds.get(entity);
    if (!entity_id) {
      logger.warn({ name: entity.name }, "state update for entity that is not registered");
      return;
    }
    const state: DisplayState = entity.available ? entity.state : "unavailable";
    const attributes = attributesFor(entity);
    const old_state = states.get(entity_id);
    const unchanged =
      old_state && old_state.state === state && sameAttributes(old_state.attributes, attributes);
    if (unchanged && !entity.force_update) {
      logger.trace({ entity_id }, "state unchanged");
      return;
    }
    const now = dayjs().toISOString();
    const new_state: EntityStateRecord = {
      attributes,
      entity_id,
      last_changed: old_state && old_state.state === state ? old_state.last_changed : now,
      last_updated: now,
      state,
    };
    states.set(entity_id, new_state);
    logger.trace({ entity_id, state }, "state changed");
    event.emit(EVENT_STATE_CHANGED, {
      entity_id,
      new_state,
      old_state,
    } satisfies StateChangedEvent);
  }

  // #MARK: add
  /**
   * Register + activate an entity, returns the assigned entity id.
   *
   * Entities reusing an existing `unique_id` are refused
   */
  function add(entity: HostEntity): string | undefined {
    if (entityIds.has(entity)) {
      throw new InternalError(context, "ENTITY_COLLISION", `${entity.name} is already registered`);
    }
    const { unique_id } = entity;
    if (unique_id !== undefined && uniqueIds.has(unique_id)) {
      logger.warn(
        { name: entity.name, unique_id },
        "entity with this unique_id already exists, ignoring",
      );
      return undefined;
    }
    const entity_id = nextEntityId(entity.name);
    if (unique_id !== undefined) {
      uniqueIds.add(unique_id);
    }
    entities.set(entity_id, entity);
    entityIds.set(entity, entity_id);
    entity.onAdded();
    logger.info({ entity_id, unique_id }, "added [%s]", entity.name);
    scheduleUpdate(entity);
    return entity_id;
  }

  // #MARK: remove
  function remove(entity: HostEntity) {
    const entity_id = entityIds.get(entity);
    if (!entity_id) {
      return;
    }
    entityIds.delete(entity);
    entities.delete(entity_id);
    if (entity.unique_id !== undefined) {
      uniqueIds.delete(entity.unique_id);
    }
    entity.onRemoved();
    const old_state = states.get(entity_id);
    states.delete(entity_id);
    logger.info({ entity_id }, "removed [%s]", entity.name);
    event.emit(EVENT_STATE_CHANGED, {
      entity_id,
      new_state: undefined,
      old_state,
    } satisfies StateChangedEvent);
  }

  function onStateChanged(callback: (change: StateChangedEvent) => void): Unsubscriber {
    event.on(EVENT_STATE_CHANGED, callback);
    return () => event.removeListener(EVENT_STATE_CHANGED, callback);
  }

  lifecycle.onPreShutdown(() => {
    logger.debug({ count: entities.size }, "removing entities");
    [...entities.values()].forEach(entity => remove(entity));
  });

  const host: EntityHost = { remove, scheduleUpdate };

  return {
    add,
    byId: (entity_id: string) => entities.get(entity_id),
    entityId: (entity: HostEntity) => entityIds.get(entity),
    getState: (entity_id: string) => states.get(entity_id),
    host,
    list: () => [...entities.keys()],
    onStateChanged,
    remove,
    scheduleUpdate,
  };
}
