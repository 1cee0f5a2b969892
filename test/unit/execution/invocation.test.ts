import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  InvocationBuilder,
  compileLogicalCommand,
  defaultBuildPath,
  projectNameOf,
} from '../../../src/execution/invocation.js';
import { EngineError, EngineErrorCode } from '../../../src/shared/errors.js';
import type { OperationRequest } from '../../../src/types/command.js';

describe('InvocationBuilder', () => {
  let workdir: string;
  let builder: InvocationBuilder;

  beforeEach(async () => {
    workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'ace-builder-'));
    builder = new InvocationBuilder({ workdir, verboseCompile: true });
  });

  afterEach(async () => {
    await fs.rm(workdir, { recursive: true, force: true });
  });

  describe('compile', () => {
    const sketchPath = '/sketches/blink/blink.ino';

    it('injects a build path derived from the project name and creates it', async () => {
      const built = await builder.build({ operation: 'compile', sketchPath, fqbn: 'arduino:avr:uno' });
      const buildPath = path.join(workdir, 'build_blink');

      expect(built.argv).toEqual([
        'compile', sketchPath, '--fqbn', 'arduino:avr:uno', '--build-path', buildPath, '-v',
      ]);
      expect(built.buildPath).toBe(buildPath);
      expect(built.env).toEqual({ TMPDIR: buildPath, TMP: buildPath, TEMP: buildPath });
      expect((await fs.stat(buildPath)).isDirectory()).toBe(true);
    });

    it('keeps a caller-supplied build path', async () => {
      const custom = path.join(workdir, 'out');
      const built = await builder.build({ operation: 'compile', sketchPath, buildPath: custom, verbose: false });
      expect(built.argv).toEqual(['compile', sketchPath, '--build-path', custom]);
      expect(built.argv.filter((a) => a === '--build-path')).toHaveLength(1);
    });

    it('uses the project-level logical command as cache key', async () => {
      const built = await builder.build({ operation: 'compile', sketchPath, fqbn: 'esp32:esp32:esp32' });
      expect(built.logicalCommand).toBe('compile -b esp32:esp32:esp32 blink');
      expect(compileLogicalCommand(sketchPath)).toBe('compile blink');
    });

    it('is idempotent for identical requests', async () => {
      const request = { operation: 'compile' as const, sketchPath, fqbn: 'arduino:avr:uno' };
      const a = await builder.build(request);
      const b = await builder.build(request);
      expect(b.argv).toEqual(a.argv);
      expect(b.env).toEqual(a.env);
    });

    it('rejects an empty sketch path', async () => {
      await expect(builder.build({ operation: 'compile', sketchPath: '  ' })).rejects.toThrow(EngineError);
    });
  });

  describe('upload', () => {
    it('uploads a sketch by path', async () => {
      const built = await builder.build({ operation: 'upload', port: '/dev/ttyACM0', fqbn: 'arduino:avr:uno', sketchPath: '/s/blink/blink.ino' });
      expect(built.argv).toEqual(['upload', '-p', '/dev/ttyACM0', '--fqbn', 'arduino:avr:uno', '/s/blink/blink.ino']);
      expect(built.logicalCommand).toBe('upload -p /dev/ttyACM0 --fqbn arduino:avr:uno /s/blink/blink.ino');
      expect(built.env).toEqual({});
    });

    it('prefers an input file over a sketch path', async () => {
      const built = await builder.build({ operation: 'upload', port: 'COM3', inputFile: '/b/blink.ino.hex', sketchPath: '/s/blink.ino' });
      expect(built.argv).toEqual(['upload', '-p', 'COM3', '-i', '/b/blink.ino.hex']);
    });

    it('needs a sketch or an input file', async () => {
      await expect(builder.build({ operation: 'upload', port: 'COM3' })).rejects.toMatchObject({
        code: EngineErrorCode.INVALID_REQUEST,
      });
    });
  });

  const simpleCases: Array<[OperationRequest, string[]]> = [
    [{ operation: 'board-list' }, ['board', 'list']],
    [{ operation: 'board-listall' }, ['board', 'listall']],
    [{ operation: 'board-listall' as const, platformId: 'arduino:avr' }, ['board', 'listall', 'arduino:avr']],
    [{ operation: 'core-list' }, ['core', 'list']],
    [{ operation: 'core-install' as const, platformId: 'arduino:avr' }, ['core', 'install', 'arduino:avr']],
    [{ operation: 'core-update-index' }, ['core', 'update-index']],
    [{ operation: 'config-init' }, ['config', 'init']],
    [{ operation: 'config-add' as const, key: 'board_manager.additional_urls', value: 'https://example.test/index.json' },
      ['config', 'add', 'board_manager.additional_urls', 'https://example.test/index.json']],
    [{ operation: 'version' }, ['version']],
  ];

  it.each(simpleCases)('builds %o', async (request, argv) => {
    const built = await builder.build(request);
    expect(built.argv).toEqual(argv);
    expect(built.logicalCommand).toBe(argv.join(' '));
  });

  it('derives names from the sketch directory', () => {
    expect(projectNameOf('/a/b/blink/blink.ino')).toBe('blink');
    expect(defaultBuildPath('/w', '/a/blink/blink.ino')).toBe(path.join('/w', 'build_blink'));
  });
});
