import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { createServerLogger } from '../servers/logging.js';
import { CsvSpecStore } from '../store/csv-store.js';
import { SpecStoreError, type SpecStore } from '../store/types.js';
import { ParameterSpecEngine } from './engine.js';
import { ParameterSpecError } from './errors.js';
import type { ParameterSpec } from './types.js';

const TEMPERATURE = {
  tool_name: 'TOOL_A',
  parameter_name: 'temperature',
  usl: 100,
  lsl: 0,
  ucl: 90,
  lcl: 10,
  cl: 50,
};

async function rejectionOf(promise: Promise<unknown>): Promise<ParameterSpecError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ParameterSpecError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the add to be rejected');
}

describe('ParameterSpecEngine', () => {
  let tempDir: string;
  let csvPath: string;
  let engine: ParameterSpecEngine;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spec-engine-test-'));
    csvPath = path.join(tempDir, 'data', 'parameter_specs.csv');
    engine = new ParameterSpecEngine({ store: new CsvSpecStore({ filePath: csvPath }) });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should list nothing from a store that was never written', async () => {
    expect(await engine.listAll()).toEqual([]);
  });

  it('should return an added record unchanged from listAll', async () => {
    const created = await engine.add(TEMPERATURE);

    expect(created).toEqual(TEMPERATURE);
    expect(await engine.listAll()).toEqual([created]);
  });

  it('should reject a duplicate key in any casing and keep one record', async () => {
    await engine.add(TEMPERATURE);

    const error = await rejectionOf(
      engine.add({ ...TEMPERATURE, tool_name: 'tool_a', parameter_name: 'TEMPERATURE', usl: 200 })
    );

    expect(error.code).toBe('DUPLICATE_KEY');
    expect(await engine.listAll()).toHaveLength(1);
  });

  it('should treat names that only share a prefix as distinct', async () => {
    await engine.add(TEMPERATURE);
    await engine.add({ ...TEMPERATURE, tool_name: 'TOOL_AB' });
    await engine.add({ ...TEMPERATURE, parameter_name: 'temperature_2' });

    expect((await engine.listAll()).map((s) => s.tool_name)).toEqual(['TOOL_A', 'TOOL_AB', 'TOOL_A']);
  });

  it('should compare keys after trimming', async () => {
    await engine.add(TEMPERATURE);

    const error = await rejectionOf(engine.add({ ...TEMPERATURE, tool_name: ' TOOL_A  ' }));
    expect(error.code).toBe('DUPLICATE_KEY');
  });

  it('should not touch the file when validation fails', async () => {
    await rejectionOf(engine.add({ ...TEMPERATURE, lsl: 10 }));

    await expect(fs.access(csvPath)).rejects.toThrow();
  });

  it('should store extra keys nowhere', async () => {
    await engine.add({ ...TEMPERATURE, operator: 'alice' });

    const content = await fs.readFile(csvPath, 'utf-8');
    expect(content).toBe(
      'tool_name,parameter_name,usl,lsl,ucl,lcl,cl\n' +
        'TOOL_A,temperature,100.000,0.000,90.000,10.000,50.000\n'
    );
  });

  it('should keep a file with reordered columns readable after an add', async () => {
    await fs.mkdir(path.dirname(csvPath), { recursive: true });
    await fs.writeFile(
      csvPath,
      'cl,lcl,ucl,lsl,usl,parameter_name,tool_name\n50,10,90,0,100,temperature,TOOL_A\n',
      'utf-8'
    );

    await engine.add({ ...TEMPERATURE, tool_name: 'TOOL_B' });

    expect(await engine.listAll()).toEqual([TEMPERATURE, { ...TEMPERATURE, tool_name: 'TOOL_B' }]);
    await rejectionOf(engine.add({ ...TEMPERATURE, tool_name: 'tool_b' }));
  });

  it('should let exactly one of two concurrent identical adds succeed', async () => {
    const results = await Promise.allSettled([engine.add(TEMPERATURE), engine.add(TEMPERATURE)]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' ? rejected.reason : undefined).toBeInstanceOf(
      ParameterSpecError
    );
    expect(await engine.listAll()).toHaveLength(1);
  });

  it('should keep every concurrent add of distinct keys', async () => {
    const names = Array.from({ length: 10 }, (_, i) => `param_${String(i)}`);
    await Promise.all(names.map((name) => engine.add({ ...TEMPERATURE, parameter_name: name })));

    const stored = await engine.listAll();
    expect(stored.map((s) => s.parameter_name).sort()).toEqual([...names].sort());

    const lines = (await fs.readFile(csvPath, 'utf-8')).split('\n');
    expect(lines).toHaveLength(12);
    expect(lines[11]).toBe('');
  });

  it('should release the lock after a failed add', async () => {
    await engine.add(TEMPERATURE);
    await rejectionOf(engine.add(TEMPERATURE));

    await expect(engine.add({ ...TEMPERATURE, tool_name: 'TOOL_B' })).resolves.toMatchObject({
      tool_name: 'TOOL_B',
    });
  });

  describe('logging', () => {
    it('should log accepted adds at info and rejections at debug', async () => {
      const lines: string[] = [];
      const logger = createServerLogger({
        serverName: 'engine',
        level: 'debug',
        now: () => new Date('2026-01-02T03:04:05.000Z'),
        write: (line) => {
          lines.push(line);
        },
      });
      const logged = new ParameterSpecEngine({
        store: new CsvSpecStore({ filePath: csvPath }),
        logger,
      });

      await logged.add(TEMPERATURE);
      await rejectionOf(logged.add({ ...TEMPERATURE, usl: 'high' }));

      expect(lines).toEqual([
        '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","server":"engine",' +
          '"event":"spec_added","data":{"tool_name":"TOOL_A","parameter_name":"temperature"}}\n',
        '{"timestamp":"2026-01-02T03:04:05.000Z","level":"debug","server":"engine",' +
          '"event":"spec_rejected","data":{"code":"INVALID_NUMBER","field":"usl"}}\n',
      ]);
    });
  });

  describe('store failures', () => {
    it('should propagate store errors unchanged', async () => {
      const failure = new SpecStoreError('disk full', 'write_failed', 'x.csv');
      const store: SpecStore = {
        readAll(): Promise<ParameterSpec[]> {
          return Promise.resolve([]);
        },
        append(): Promise<void> {
          return Promise.reject(failure);
        },
      };
      const failing = new ParameterSpecEngine({ store });

      await expect(failing.add(TEMPERATURE)).rejects.toBe(failure);
    });
  });
});
