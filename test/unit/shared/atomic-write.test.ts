import path from 'path';
import fs from 'fs/promises';
import { AtomicFileWriter } from '../../../src/shared/atomic-write.js';
import { makeTmpDir } from '../../helpers/fakes.js';

describe('AtomicFileWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTmpDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('replaces the content and keeps the file mode', async () => {
    const target = path.join(tmpDir, 'sources.list');
    await fs.writeFile(target, 'old\n');
    await fs.chmod(target, 0o600);

    await new AtomicFileWriter().write(target, 'new\n');

    expect(await fs.readFile(target, 'utf-8')).toBe('new\n');
    expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
    expect(await fs.readdir(tmpDir)).toEqual(['sources.list']);
  });

  it('creates a missing file', async () => {
    const target = path.join(tmpDir, 'new.list');
    await new AtomicFileWriter().write(target, Buffer.from('deb x\n'));
    expect(await fs.readFile(target, 'utf-8')).toBe('deb x\n');
  });

  it('leaves the original intact and removes the temp file when the rename fails', async () => {
    const target = path.join(tmpDir, 'sources.list');
    await fs.writeFile(target, 'original\n');
    const writer = new AtomicFileWriter({
      rename: async () => {
        throw new Error('EXDEV');
      },
    });

    await expect(writer.write(target, 'replacement\n')).rejects.toThrow('EXDEV');

    expect(await fs.readFile(target, 'utf-8')).toBe('original\n');
    expect(await fs.readdir(tmpDir)).toEqual(['sources.list']);
  });
});
