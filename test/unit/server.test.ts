import path from 'path';
import fs from 'fs/promises';
import { createContext } from '../../src/server.js';
import { makeTmpDir } from '../helpers/fakes.js';

describe('createContext', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTmpDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads the config and registers every tool', async () => {
    const configPath = path.join(tmpDir, 'config.yaml');

    const ctx = createContext({ configPath, osReleasePath: path.join(tmpDir, 'os-release') });

    expect(ctx.firstRun).toBe(true);
    expect(ctx.configPath).toBe(configPath);
    expect(ctx.registry.size).toBe(8);
    expect(ctx.lockProbe.resource).toBe(ctx.config.lock.paths.join(', '));
  });
});
