import type { ChatCompletionTool } from "openai/resources";
import type { MetadataStorePort } from "../ports/storage/MetadataStorePort";
import type { DynamicToolRegistry } from "../adapters/tools/DynamicToolRegistry";
import type { ToolMetadataRecord } from "../domain/tools/types";

export const EMPTY_CATALOG_TEXT = "(no registered tools)";

/** Presents the callable tools to the generating model. */
export class ToolCatalog {
  constructor(
    private readonly metadata: MetadataStorePort,
    private readonly registry: DynamicToolRegistry
  ) {}

  /** Enabled records that also have a live registry entry, by name. */
  async available(): Promise<ToolMetadataRecord[]> {
    const records = await this.metadata.list();
    return records.filter((record) => record.enabled && this.registry.lookup(record.name) !== undefined);
  }

  async formatToolsForPrompt(): Promise<string> {
    const lines = (await this.available()).map(
      (record) =>
        `${record.name}${record.signature} - ${record.description} uses=${record.uses} ok=${record.successes}`
    );
    return lines.length ? lines.join("\n") : EMPTY_CATALOG_TEXT;
  }

  async toFunctionSpecs(): Promise<ChatCompletionTool[]> {
    return (await this.available()).map((record): ChatCompletionTool => ({
      type: "function",
      function: {
        name: record.name,
        description: record.description,
        parameters: record.parameterSchema,
      },
    }));
  }
}
