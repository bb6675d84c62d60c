import type { MessageCallback, QoS, TopicSubscriber, Unsubscriber } from "./utility.mts";

export type TopicSpec = {
  topic: string;
  msg_callback: MessageCallback;
  qos: QoS;
};

export type TopicSpecMap = Record<string, TopicSpec>;

type SubscriptionEntry = {
  topic: string;
  qos: QoS;
  callback: MessageCallback;
  unsubscribe: Unsubscriber;
};

/**
 * Opaque handle, keyed the same way as the `TopicSpecMap` that produced it
 */
export type SubscriptionState = ReadonlyMap<string, SubscriptionEntry>;

// #MARK: subscribeTopics
/**
 * (Re)subscribe a keyed set of topics.
 *
 * - keys with the same topic + qos as before keep their transport subscription, callback is swapped
 * - changed keys are unsubscribed, then subscribed again
 * - keys missing from `topics` are unsubscribed
 */
export function subscribeTopics(
  transport: TopicSubscriber,
  previous: SubscriptionState | undefined,
  topics: TopicSpecMap,
): SubscriptionState {
  const stale = new Map(previous);
  const next = new Map<string, SubscriptionEntry>();

  Object.entries(topics).forEach(([key, { topic, qos, msg_callback }]) => {
    const current = stale.get(key);
    stale.delete(key);
    if (current && current.topic === topic && current.qos === qos) {
      current.callback = msg_callback;
      next.set(key, current);
      return;
    }
    current?.unsubscribe();
    const entry: SubscriptionEntry = {
      callback: msg_callback,
      qos,
      topic,
      unsubscribe: () => {},
    };
    // route through the entry so a later callback swap takes effect
    entry.unsubscribe = transport.subscribe(
      topic,
      (received, payload, received_qos) => entry.callback(received, payload, received_qos),
      qos,
    );
    next.set(key, entry);
  });

  stale.forEach(entry => entry.unsubscribe());
  return next;
}

// #MARK: unsubscribeTopics
export function unsubscribeTopics(state: SubscriptionState | undefined): undefined {
  state?.forEach(entry => entry.unsubscribe());
  return undefined;
}
