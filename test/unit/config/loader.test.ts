import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfigFile } from '../../../src/config/loader';
import { ConfigurationError } from '../../../src/errors';

describe('loadConfigFile', () => {
  let dir: string;

  const write = async (name: string, content: string): Promise<string> => {
    const path = join(dir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  };

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'run-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should parse a valid file', async () => {
    const path = await write(
      'valid.yaml',
      ['port: 8080', 'readiness:', '  strategy: parallel', 'commands:', '  worker: [celery, worker]'].join('\n'),
    );

    await expect(loadConfigFile(path)).resolves.toEqual({
      port: 8080,
      readiness: { strategy: 'parallel' },
      commands: { worker: ['celery', 'worker'] },
    });
  });

  it('should treat an empty file as an empty configuration', async () => {
    const path = await write('empty.yaml', '');

    await expect(loadConfigFile(path)).resolves.toEqual({});
  });

  it('should report a missing file', async () => {
    const path = join(dir, 'absent.yaml');

    await expect(loadConfigFile(path)).rejects.toThrow(`Cannot read configuration file ${path}: `);
  });

  it('should report invalid YAML', async () => {
    const path = await write('broken.yaml', 'port: [8080');

    const result = loadConfigFile(path);
    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(result).rejects.toThrow(`Invalid YAML in ${path}: `);
  });

  it('should report schema violations by path', async () => {
    const path = await write('wrong.yaml', 'port: eighty\nreadiness:\n  maxAttempts: 0\n');

    await expect(loadConfigFile(path)).rejects.toMatchObject({
      message: `Invalid configuration file ${path}`,
      source: path,
      violations: [
        { path: 'port', message: 'Expected number, received string' },
        { path: 'readiness.maxAttempts', message: 'Number must be greater than 0' },
      ],
    });
  });

  it('should reject a sleep interval longer than a timer can wait', async () => {
    const path = await write('slow.yaml', 'readiness:\n  intervalSeconds: 3000000\n');

    await expect(loadConfigFile(path)).rejects.toMatchObject({
      violations: [{ path: 'readiness.intervalSeconds', message: 'Number must be less than or equal to 2147483.647' }],
    });
  });

  it('should reject unknown keys', async () => {
    const path = await write('extra.yaml', 'prot: 8080\n');

    await expect(loadConfigFile(path)).rejects.toMatchObject({
      violations: [{ path: '', message: "Unrecognized key(s) in object: 'prot'" }],
    });
  });
});
