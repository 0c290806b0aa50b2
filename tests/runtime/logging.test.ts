import fs from 'fs';
import path from 'path';
import { initializeLogging } from '../../src/runtime/logging';
import { makeTempDir } from '../support/fixtures';

async function waitForContent(file: string, marker: string): Promise<string> {
  for (let attempt = 0; attempt < 50; attempt++) {
    const content = fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : '';
    if (content.includes(marker)) return content;
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
  throw new Error(`${marker} never reached ${file}`);
}

describe('initializeLogging', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('without a log file nothing is mirrored', () => {
    const handle = initializeLogging(undefined);
    expect(handle.logPath).toBeUndefined();
    handle.shutdown();
  });

  test('mirrors console output to the log file until shutdown', async () => {
    const dir = makeTempDir('logging-');
    const infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    const file = path.join(dir, 'nested', 'host.log');

    const handle = initializeLogging(file);
    expect(handle.logPath).toBe(file);

    console.info('loaded', { tools: 2 });
    console.warn('skipped', 'one');
    handle.shutdown();
    console.info('after shutdown');

    const lines = (await waitForContent(file, 'session ended')).trim().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(/--- tool host session started ---$/);
    expect(lines[1]).toMatch(/\] INFO loaded \{"tools":2\}$/);
    expect(lines[2]).toMatch(/\] WARN skipped one$/);
    expect(lines[3]).toMatch(/--- tool host session ended ---$/);
    expect(infoSpy).toHaveBeenCalledWith('loaded', { tools: 2 });

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
