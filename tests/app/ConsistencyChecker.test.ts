import fs from 'fs';
import { FileArtifactStore } from '../../src/adapters/storage/FileArtifactStore';
import { JsonMetadataStore } from '../../src/adapters/storage/JsonMetadataStore';
import { ConsistencyChecker } from '../../src/app/ConsistencyChecker';
import { ToolProvisioner } from '../../src/app/ToolProvisioner';
import { ADD_SOURCE, FakeTime, makeRecord, makeTempDir, silentLogger } from '../support/fixtures';

describe('ConsistencyChecker', () => {
  let dir: string;
  let artifacts: FileArtifactStore;
  let metadata: JsonMetadataStore;

  beforeEach(() => {
    dir = makeTempDir('consistency-');
    artifacts = new FileArtifactStore({ dir, time: new FakeTime() });
    metadata = new JsonMetadataStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('a clean store has no orphans and logs nothing', async () => {
    const provisioner = new ToolProvisioner({ artifacts, metadata, logger: silentLogger() });
    await provisioner.propose({ declaredName: 'add', source: ADD_SOURCE });
    const logger = silentLogger();

    const report = await new ConsistencyChecker(artifacts, metadata, logger).scan();
    expect(report).toEqual({ orphanMetadata: [], orphanArtifacts: [], healthy: ['add'] });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('reports orphans on both sides', async () => {
    const provisioner = new ToolProvisioner({ artifacts, metadata, logger: silentLogger() });
    await provisioner.propose({ declaredName: 'add', source: ADD_SOURCE });
    await metadata.upsert(makeRecord('ghost'));
    await metadata.upsert(makeRecord('another_ghost'));
    await artifacts.save('stray', 'function stray() {}\n');
    const logger = silentLogger();

    const report = await new ConsistencyChecker(artifacts, metadata, logger).scan();
    expect(report).toEqual({
      orphanMetadata: ['another_ghost', 'ghost'],
      orphanArtifacts: ['stray'],
      healthy: ['add'],
    });
    expect(logger.warn).toHaveBeenCalledWith('Orphaned tools found', {
      orphanMetadata: ['another_ghost', 'ghost'],
      orphanArtifacts: ['stray'],
    });
  });
});
