import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { realpathSync } from 'fs';
import { FsConfigStore, createConfigManager } from './fs_config_store';
import {
  ConfigAlreadyExistsError,
  ConfigReadError,
} from '../../config_manager/config_manager.errors';

describe('FsConfigStore', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = realpathSync(await mkdtemp(join(tmpdir(), 'config-store-test-')));
    configPath = join(tmpDir, 'watchrun.json');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should parse the config file', async () => {
      await writeFile(configPath, '{"monitored_dirs":["./"],"program":"echo","args":"ok"}');
      const store = new FsConfigStore(configPath);

      await expect(store.load()).resolves.toEqual({ monitored_dirs: ['./'], program: 'echo', args: 'ok' });
    });

    it('should throw ConfigReadError for a missing file', async () => {
      const store = new FsConfigStore(configPath);

      await expect(store.load()).rejects.toThrow(ConfigReadError);
      await expect(store.load()).rejects.toThrow(`cannot read config file ${configPath}: file not found`);
    });

    it('should throw ConfigReadError when the path is a directory', async () => {
      const store = new FsConfigStore(tmpDir);

      await expect(store.load()).rejects.toThrow(`cannot read config file ${tmpDir}: is a directory`);
    });

    it('should throw ConfigReadError for invalid JSON', async () => {
      await writeFile(configPath, 'program = echo');
      const store = new FsConfigStore(configPath);

      await expect(store.load()).rejects.toThrow(ConfigReadError);
    });
  });

  describe('create', () => {
    it('should write two-space JSON', async () => {
      const store = new FsConfigStore(configPath);

      await store.create({ monitored_dirs: ['src'], program: 'make', args: 'all' });

      const content = await readFile(configPath, 'utf-8');
      expect(content).toBe('{\n  "monitored_dirs": [\n    "src"\n  ],\n  "program": "make",\n  "args": "all"\n}');
    });

    it('should refuse to replace an existing file', async () => {
      await writeFile(configPath, '{"program":"keep"}');
      const store = new FsConfigStore(configPath);

      await expect(store.create({ monitored_dirs: [], program: '', args: '' })).rejects.toThrow(
        ConfigAlreadyExistsError
      );
      expect(await readFile(configPath, 'utf-8')).toBe('{"program":"keep"}');
    });
  });

  describe('createConfigManager', () => {
    it('should create the file once and report it as existing afterwards', async () => {
      const manager = createConfigManager(configPath);

      const first = await manager.initConfig();
      const written = await readFile(configPath, 'utf-8');
      const second = await manager.initConfig();

      expect(first).toEqual({ created: true, location: configPath });
      expect(second).toEqual({ created: false, location: configPath });
      expect(await readFile(configPath, 'utf-8')).toBe(written);
    });

    it('should round-trip a config written by hand', async () => {
      await writeFile(configPath, '{"monitored_dirs":["./"],"program":"echo","args":"ok"}');

      const { config, errors } = await createConfigManager(configPath).loadConfig();

      expect(errors).toEqual([]);
      expect(`${config.program} ${config.args}`).toBe('echo ok');
    });
  });
});
