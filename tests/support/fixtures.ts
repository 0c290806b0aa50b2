import fs from 'fs';
import os from 'os';
import path from 'path';
import type { LoggerPort } from '../../src/ports/sys/LoggerPort';
import type { TimePort } from '../../src/ports/sys/TimePort';
import type { ToolMetadataRecord } from '../../src/domain/tools/types';

export const T0 = Date.UTC(2024, 0, 1);

export function makeTempDir(prefix = 'dyn-tools-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function silentLogger(): jest.Mocked<LoggerPort> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** Clock that only moves when told to. */
export class FakeTime implements TimePort {
  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  toIsoString(epochMs: number): string {
    return new Date(epochMs).toISOString();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeRecord(name: string, overrides: Partial<ToolMetadataRecord> = {}): ToolMetadataRecord {
  return {
    name,
    description: `${name} tool`,
    parameterSchema: { type: 'object', properties: {}, required: [], additionalProperties: false },
    version: 1,
    enabled: true,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    signature: '()',
    origin: 'dynamic',
    uses: 0,
    successes: 0,
    ...overrides,
  };
}

export const ADD_SOURCE = 'function add(a, b) {\n  return a + b;\n}\n';
