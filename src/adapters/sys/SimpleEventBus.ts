import { Topics, type EventBus, type Subscription, type Topic, type TopicPayloads } from "../../domain/events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeError } from "../../shared/result";
import { ConsoleLogger } from "./ConsoleLogger";

type TopicMap = {
  [K in Topic]: Set<(payload: TopicPayloads[K]) => void>;
};

export class SimpleEventBus implements EventBus {
  // One set per topic up front; sets are only ever mutated, never replaced.
  private readonly handlers: TopicMap = {
    [Topics.ToolAccepted]: new Set(),
    [Topics.ToolRejected]: new Set(),
    [Topics.ToolRetired]: new Set(),
    [Topics.RegistryReloaded]: new Set(),
    [Topics.ReloadRequested]: new Set(),
  };

  constructor(private readonly logger: LoggerPort = new ConsoleLogger()) {}

  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void {
    const listeners: Set<(payload: TopicPayloads[K]) => void> = this.handlers[topic];
    for (const handler of Array.from(listeners)) {
      try {
        handler(payload);
      } catch (err) {
        this.logger.warn(`Event handler for topic ${topic} failed`, { error: describeError(err) });
      }
    }
  }

  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): Subscription {
    const listeners: Set<(payload: TopicPayloads[K]) => void> = this.handlers[topic];
    listeners.add(handler);

    return {
      unsubscribe: () => {
        listeners.delete(handler);
      },
    };
  }
}
