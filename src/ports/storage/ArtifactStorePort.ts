import type { IoError } from "../../domain/tools/errors";
import type { ToolArtifact } from "../../domain/tools/types";
import type { Result } from "../../shared/result";

export interface ArtifactStorePort {
  /** Writes or fully overwrites the artifact for `name`. Never executes it. */
  save(name: string, canonicalSource: string): Promise<Result<ToolArtifact, IoError>>;
  read(name: string): Promise<ToolArtifact | null>;
  /** Resolves to false when there was nothing to delete. */
  remove(name: string): Promise<Result<boolean, IoError>>;
  list(): Promise<string[]>;
}
