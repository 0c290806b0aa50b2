import type { ArtifactStorePort } from "../ports/storage/ArtifactStorePort";
import type { MetadataStorePort } from "../ports/storage/MetadataStorePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";

export interface ConsistencyReport {
  /** Metadata record present, artifact missing. */
  orphanMetadata: string[];
  /** Artifact present, metadata record missing. */
  orphanArtifacts: string[];
  healthy: string[];
}

export class ConsistencyChecker {
  constructor(
    private readonly artifacts: ArtifactStorePort,
    private readonly metadata: MetadataStorePort,
    private readonly logger: LoggerPort = new ConsoleLogger({ scope: "consistency" })
  ) {}

  async scan(): Promise<ConsistencyReport> {
    const artifactNames = new Set(await this.artifacts.list());
    const recordNames = new Set((await this.metadata.list()).map((record) => record.name));

    const report: ConsistencyReport = {
      orphanMetadata: [...recordNames].filter((name) => !artifactNames.has(name)).sort(),
      orphanArtifacts: [...artifactNames].filter((name) => !recordNames.has(name)).sort(),
      healthy: [...recordNames].filter((name) => artifactNames.has(name)).sort(),
    };

    if (report.orphanMetadata.length || report.orphanArtifacts.length) {
      this.logger.warn("Orphaned tools found", {
        orphanMetadata: report.orphanMetadata,
        orphanArtifacts: report.orphanArtifacts,
      });
    }
    return report;
  }
}
