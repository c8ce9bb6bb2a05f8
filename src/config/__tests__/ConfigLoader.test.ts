import { initConfig, loadConfig, parseConfigContent } from '../ConfigLoader';
import { ConfigError } from '../../errors';
import { DAY_MS, makeTempDir, removeTempDir } from '../../__tests__/fixtures';
import * as fs from 'fs';
import * as path from 'path';

const YAML_CONFIG = `
dryRun: true
logging:
  level: warn
tasks:
  - id: app
    directory: /var/log/app
    pattern: "*.log.*"
    recursive: true
    retention:
      maxAge: 7d
      maxTotalSize: 10MB
`;

describe('ConfigLoader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('loadConfig', () => {
    it('should load a YAML config file', async () => {
      const configPath = path.join(tempDir, 'logsweep.yaml');
      await fs.promises.writeFile(configPath, YAML_CONFIG);

      const config = await loadConfig(configPath);

      expect(config).toEqual({
        dryRun: true,
        logging: { level: 'warn' },
        tasks: [{
          id: 'app',
          directory: '/var/log/app',
          pattern: { type: 'glob', glob: '*.log.*' },
          recursive: true,
          policies: [
            { kind: 'maxAge', durationMs: 7 * DAY_MS },
            { kind: 'maxTotalSize', bytes: 10 * 1024 * 1024 }
          ]
        }]
      });
    });

    it('should load a JSON config file', async () => {
      const configPath = path.join(tempDir, 'logsweep.json');
      await fs.promises.writeFile(configPath, JSON.stringify({
        tasks: [{ id: 'app', directory: '/var/log/app', suffix: '.gz', retention: { maxCount: 5 } }]
      }));

      const config = await loadConfig(configPath);

      expect(config.tasks[0].pattern).toEqual({ type: 'suffix', suffix: '.gz' });
      expect(config.tasks[0].policies).toEqual([{ kind: 'maxCount', count: 5 }]);
    });

    it('should report a missing file', async () => {
      const configPath = path.join(tempDir, 'missing.yaml');

      await expect(loadConfig(configPath)).rejects.toThrow(ConfigError);
      await expect(loadConfig(configPath)).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    it('should report validation problems', async () => {
      const configPath = path.join(tempDir, 'logsweep.yml');
      await fs.promises.writeFile(configPath, 'tasks: []\n');

      await expect(loadConfig(configPath)).rejects.toMatchObject({
        name: 'ConfigError',
        problems: ['tasks must be a non-empty list']
      });
    });
  });

  describe('parseConfigContent', () => {
    it('should parse by file extension', () => {
      expect(parseConfigContent('a: 1', '.yaml')).toEqual({ a: 1 });
      expect(parseConfigContent('a: 1', '.yml')).toEqual({ a: 1 });
      expect(parseConfigContent('{"a": 1}', '.json')).toEqual({ a: 1 });
    });

    it('should reject unsupported formats', () => {
      expect(() => parseConfigContent('a = 1', '.toml'))
        .toThrow('Unsupported config file format: .toml. Use .yaml, .yml, or .json');
      expect(() => parseConfigContent('a = 1', ''))
        .toThrow('Unsupported config file format: (none). Use .yaml, .yml, or .json');
    });

    it('should reject content that does not parse', () => {
      expect(() => parseConfigContent('tasks: [unclosed', '.yaml')).toThrow(/^Failed to parse YAML: /);
      expect(() => parseConfigContent('{ nope', '.json')).toThrow(/^Failed to parse JSON: /);
    });
  });

  describe('initConfig', () => {
    it('should write a template that loads as a valid config', async () => {
      const configPath = path.join(tempDir, 'etc', 'logsweep.yaml');

      const written = await initConfig(configPath);
      const config = await loadConfig(written);

      expect(written).toBe(configPath);
      expect(config.dryRun).toBe(false);
      expect(config.tasks).toEqual([{
        id: 'example-app',
        directory: '/var/log/example-app',
        pattern: { type: 'glob', glob: '*.log.*' },
        recursive: false,
        ignoreMissing: true,
        policies: [
          { kind: 'maxAge', durationMs: 14 * DAY_MS },
          { kind: 'maxCount', count: 10 },
          { kind: 'maxTotalSize', bytes: 500 * 1024 * 1024 }
        ]
      }]);
    });

    it('should never overwrite an existing file', async () => {
      const configPath = path.join(tempDir, 'logsweep.yaml');
      await fs.promises.writeFile(configPath, 'keep me');

      await expect(initConfig(configPath)).rejects.toThrow(`Config file already exists: ${configPath}`);
      expect(await fs.promises.readFile(configPath, 'utf8')).toBe('keep me');
    });
  });
});
