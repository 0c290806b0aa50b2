import type { ProvisionError } from "../tools/errors";
import type { LoadReport } from "../tools/types";

export interface Subscription {
  unsubscribe(): void;
}

export const Topics = {
  ToolAccepted: "tool.accepted",
  ToolRejected: "tool.rejected",
  ToolRetired: "tool.retired",
  RegistryReloaded: "registry.reloaded",
  ReloadRequested: "registry.reload",
} as const;

export interface TopicPayloads {
  "tool.accepted": { name: string; version: number };
  "tool.rejected": { name: string; error: ProvisionError };
  "tool.retired": { name: string; metadataRemoved: boolean; artifactRemoved: boolean };
  "registry.reloaded": LoadReport;
  "registry.reload": { reason: string };
}

export type Topic = keyof TopicPayloads;

export interface EventBus {
  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void;
  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): Subscription;
}
