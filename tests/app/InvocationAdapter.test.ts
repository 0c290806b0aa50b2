import fs from 'fs';
import { FileArtifactStore } from '../../src/adapters/storage/FileArtifactStore';
import { JsonMetadataStore } from '../../src/adapters/storage/JsonMetadataStore';
import { DynamicToolRegistry } from '../../src/adapters/tools/DynamicToolRegistry';
import { InvocationAdapter, type ToolArguments } from '../../src/app/InvocationAdapter';
import { ToolProvisioner } from '../../src/app/ToolProvisioner';
import { ADD_SOURCE, FakeTime, makeTempDir, silentLogger } from '../support/fixtures';

const TOOLS: Record<string, string> = {
  add: ADD_SOURCE,
  greet: 'function greet(name, greeting = "Hello") { return greeting + ", " + name; }',
  count: 'function count(...items) { return items.length; }',
  fail: 'function fail(msg) { throw new Error(msg); }',
  spin: 'function spin() { while (true) {} }',
  later: 'function later(x) { return Promise.resolve(x * 2); }',
};

const SHAPE_MISMATCHES: Array<[string, ToolArguments]> = [
  ['missing required argument', [2]],
  ['too many positional arguments', [1, 2, 3]],
  ['unknown named argument', { a: 1, b: 2, c: 3 }],
];

describe('InvocationAdapter', () => {
  let dir: string;
  let metadata: JsonMetadataStore;
  let registry: DynamicToolRegistry;
  let adapter: InvocationAdapter;
  let provisioner: ToolProvisioner;

  beforeEach(async () => {
    dir = makeTempDir('invoke-');
    const time = new FakeTime();
    const artifacts = new FileArtifactStore({ dir, time });
    metadata = new JsonMetadataStore(dir);
    provisioner = new ToolProvisioner({ artifacts, metadata, time, logger: silentLogger() });
    for (const [name, source] of Object.entries(TOOLS)) {
      const result = await provisioner.propose({
        declaredName: name,
        source,
        description: name === 'add' ? 'Adds two numbers' : undefined,
      });
      if (!result.ok) throw new Error(result.error.detail);
    }
    registry = new DynamicToolRegistry({ artifacts, metadata, time, logger: silentLogger() });
    await registry.loadAll();
    adapter = new InvocationAdapter(registry, { metadata, logger: silentLogger() });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('accepts positional and named arguments', async () => {
    expect(await adapter.call('add', [2, 3])).toEqual({ ok: true, value: 5 });
    expect(await adapter.call('add', { a: 2, b: 3 })).toEqual({ ok: true, value: 5 });
  });

  test('optional parameters may be left out', async () => {
    expect(await adapter.call('greet', ['Ada'])).toEqual({ ok: true, value: 'Hello, Ada' });
    expect(await adapter.call('greet', { name: 'Ada', greeting: 'Hi' })).toEqual({ ok: true, value: 'Hi, Ada' });
  });

  test('rest parameters take the remaining positional arguments', async () => {
    expect(await adapter.call('count', [1, 2, 3])).toEqual({ ok: true, value: 3 });
    expect(await adapter.call('count', { items: ['a', 'b'] })).toEqual({ ok: true, value: 2 });
    expect(await adapter.call('count', [])).toEqual({ ok: true, value: 0 });
  });

  test.each(SHAPE_MISMATCHES)('%s is ArgumentShapeMismatch', async (_label, args) => {
    const result = await adapter.call('add', args);
    expect(result.ok === false && result.error.code).toBe('ArgumentShapeMismatch');
  });

  test('rest parameter given a non-array is ArgumentShapeMismatch', async () => {
    const result = await adapter.call('count', { items: 'x' });
    expect(result.ok === false && result.error.code).toBe('ArgumentShapeMismatch');
  });

  test('too many positional arguments names the counts', async () => {
    expect(await adapter.call('add', [1, 2, 3])).toEqual({
      ok: false,
      error: { code: 'ArgumentShapeMismatch', name: 'add', detail: 'expected at most 2 arguments, got 3' },
    });
  });

  test('unknown tools and body failures', async () => {
    expect(await adapter.call('nope', [])).toEqual({ ok: false, error: { code: 'UnknownTool', name: 'nope' } });
    expect(await adapter.call('fail', ['boom'])).toEqual({
      ok: false,
      error: { code: 'InvocationError', name: 'fail', cause: 'boom' },
    });
  });

  test('a deadline overrun is an InvocationError', async () => {
    const result = await adapter.call('spin', [], { timeoutMs: 50 });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.code === 'InvocationError') {
      expect(result.error.cause).toMatch(/timed out/);
    }

    const bounded = new InvocationAdapter(registry, { defaultTimeoutMs: 50, logger: silentLogger() });
    expect((await bounded.call('spin', [])).ok).toBe(false);
  });

  test('awaits promise results', async () => {
    expect(await adapter.call('later', [2])).toEqual({ ok: true, value: 4 });
  });

  test('records a use for every call that reached the tool body', async () => {
    await adapter.call('add', [1, 2]);
    await adapter.call('add', { a: 1, b: 2 });
    await adapter.call('add', [1]);
    await adapter.call('fail', ['x']);

    expect(await metadata.get('add')).toMatchObject({ uses: 2, successes: 2 });
    expect(await metadata.get('fail')).toMatchObject({ uses: 1, successes: 0 });
  });

  test('a failing statistics write does not fail the call', async () => {
    const logger = silentLogger();
    jest.spyOn(metadata, 'recordUse').mockRejectedValue(new Error('disk gone'));
    const noisy = new InvocationAdapter(registry, { metadata, logger });

    expect(await noisy.call('add', [1, 2])).toEqual({ ok: true, value: 3 });
    expect(logger.warn).toHaveBeenCalledWith('Failed to record tool use', { name: 'add', error: 'disk gone' });
  });

  test('exposes the registry through ToolRegistryPort', async () => {
    const definitions = adapter.list();
    expect(definitions.map((d) => d.name).sort()).toEqual(['add', 'count', 'fail', 'greet', 'later', 'spin']);
    expect(definitions.find((d) => d.name === 'add')).toEqual({
      name: 'add',
      description: 'Adds two numbers',
      schema: {
        type: 'object',
        properties: { a: {}, b: {} },
        required: ['a', 'b'],
        additionalProperties: false,
      },
    });

    expect(await adapter.exec('add', { a: 1, b: 2 })).toEqual({ ok: true, data: 3 });
    expect(await adapter.exec('nope', {})).toEqual({ ok: false, message: 'Tool "nope" is not registered.' });
    expect(await adapter.exec('fail', ['boom'])).toEqual({ ok: false, message: 'Tool "fail" failed: boom' });
  });

  test('a parameter schema carrying an $id stays usable across proposals and reloads', async () => {
    const parameterSchema = {
      $id: 'https://example.test/echo',
      type: 'object' as const,
      properties: { value: { type: 'number' } },
      required: ['value'],
    };
    const source = 'function echo(value) { return value; }';

    expect((await provisioner.propose({ declaredName: 'echo', source, parameterSchema })).ok).toBe(true);
    expect((await provisioner.propose({ declaredName: 'echo', source, parameterSchema })).ok).toBe(true);

    await registry.loadAll();
    expect(await adapter.call('echo', [1])).toEqual({ ok: true, value: 1 });
    await registry.loadAll();
    expect(await adapter.call('echo', { value: 2 })).toEqual({ ok: true, value: 2 });
    expect((await adapter.call('echo', ['x'])).ok).toBe(false);
  });

  test('calling a retired tool named like an Object.prototype member records nothing', async () => {
    expect((await provisioner.propose({ declaredName: 'toString', source: 'function toString() { return 1; }' })).ok).toBe(
      true
    );
    await registry.loadAll();
    await provisioner.retire('toString');

    expect(await adapter.call('toString', [])).toEqual({ ok: true, value: 1 });
    expect(await metadata.get('toString')).toBeNull();
    expect((await metadata.list()).map((record) => record.name)).toEqual(['add', 'count', 'fail', 'greet', 'later', 'spin']);
  });

  test('parameters named like Object.prototype members are shaped as own keys only', async () => {
    const source = 'function pick(toString = "none", constructor = 0) { return [toString, constructor]; }';
    expect((await provisioner.propose({ declaredName: 'pick', source })).ok).toBe(true);
    await registry.loadAll();

    expect(await adapter.call('pick', [])).toEqual({ ok: true, value: ['none', 0] });
    expect(await adapter.call('pick', ['a', 7])).toEqual({ ok: true, value: ['a', 7] });
  });
});
