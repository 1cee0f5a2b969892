import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  defaultScratchCandidates,
  resolveScratchEnvironment,
  tempDirOverrides,
} from '../../../src/execution/environment.js';

describe('scratch environment resolver', () => {
  let tmpDir: string;
  let blocker: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ace-scratch-'));
    // A regular file: mkdir of it, or of anything beneath it, fails.
    blocker = path.join(tmpDir, 'not-a-dir');
    await fs.writeFile(blocker, 'x', 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('orders project-local, hidden project-local, then home candidates', () => {
    expect(defaultScratchCandidates('/work', '/home/dev')).toEqual([
      '/work/arduino_cli_temp',
      '/work/.arduino_tmp',
      '/home/dev/.arduino_cli_temp',
    ]);
  });

  it('selects the first candidate and creates it', async () => {
    const first = path.join(tmpDir, 'first');
    const second = path.join(tmpDir, 'second');
    const env = await resolveScratchEnvironment([first, second]);

    expect(env.scratchDir).toBe(first);
    expect(env.env).toEqual({ TMPDIR: first, TMP: first, TEMP: first });
    expect((await fs.stat(first)).isDirectory()).toBe(true);
    await expect(fs.stat(second)).rejects.toThrow();
  });

  it('skips candidates that fail creation', async () => {
    const third = path.join(tmpDir, 'third');
    const env = await resolveScratchEnvironment([blocker, path.join(blocker, 'nested'), third]);
    expect(env.scratchDir).toBe(third);
    expect(env.env['TMPDIR']).toBe(third);
  });

  it('applies no override and does not throw when every candidate fails', async () => {
    const env = await resolveScratchEnvironment([blocker, path.join(blocker, 'a'), path.join(blocker, 'b')]);
    expect(env.scratchDir).toBeUndefined();
    expect(env.env).toEqual({});
  });

  it('reuses a directory that already exists', async () => {
    const existing = path.join(tmpDir, 'existing');
    await fs.mkdir(existing);
    const env = await resolveScratchEnvironment([existing]);
    expect(env.scratchDir).toBe(existing);
  });

  it('tempDirOverrides sets all three variables', () => {
    expect(tempDirOverrides('/x')).toEqual({ TMPDIR: '/x', TMP: '/x', TEMP: '/x' });
  });
});
