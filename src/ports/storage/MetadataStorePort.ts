import type { ToolMetadataRecord } from "../../domain/tools/types";

export interface MetadataStorePort {
  upsert(record: ToolMetadataRecord): Promise<void>;
  remove(name: string): Promise<boolean>;
  list(): Promise<ToolMetadataRecord[]>;
  get(name: string): Promise<ToolMetadataRecord | null>;
  recordUse(name: string, ok: boolean): Promise<void>;
}
