import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG,
  ensureDirectories,
  expandPath,
  getConfigPath,
  getLogsPath,
  getPath,
  loadConfig,
  saveConfig,
} from '../../../src/config/config.js';

describe('Config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeConfig = (content: string): string => {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  describe('expandPath', () => {
    it('should expand a leading tilde to the home directory', () => {
      expect(expandPath('~/.switchyard')).toBe(path.join(os.homedir(), '.switchyard'));
      expect(expandPath('~')).toBe(os.homedir());
    });

    it('should leave other paths alone', () => {
      expect(expandPath('/etc/switchyard')).toBe('/etc/switchyard');
    });
  });

  describe('path helpers', () => {
    it('should resolve files under the configured base directory', () => {
      const config = { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, base_dir: tmpDir } };

      expect(getConfigPath(config)).toBe(path.join(tmpDir, 'config.json'));
      expect(getLogsPath(config)).toBe(path.join(tmpDir, 'logs'));
    });

    it('should keep absolute log directories as given', () => {
      const logDir = path.join(tmpDir, 'elsewhere');
      const config = { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, log_dir: logDir } };

      expect(getLogsPath(config)).toBe(logDir);
      expect(getPath('cache', config)).toBe(path.join(DEFAULT_CONFIG.paths.base_dir, 'cache'));
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', () => {
      const result = loadConfig(path.join(tmpDir, 'missing.json'));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(DEFAULT_CONFIG);
      }
    });

    it('should merge partial settings over the defaults', () => {
      const file = writeConfig(JSON.stringify({ orchestrator: { failure_threshold: 5, recovery: { mode: 'probe' } } }));
      const result = loadConfig(file);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.orchestrator).toEqual({
          failure_threshold: 5,
          default_timeout_ms: 30_000,
          tier_order: 'ascending',
          recovery: { mode: 'probe', probe_interval_ms: 60_000 },
        });
        expect(result.data.backends.ollama_url).toBe('http://127.0.0.1:11434');
      }
    });

    it('should keep model entries for the catalog loader', () => {
      const file = writeConfig(JSON.stringify({ models: [{ id: 'custom', backendKind: 'vision' }] }));
      const result = loadConfig(file);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.models).toEqual([{ id: 'custom', backendKind: 'vision' }]);
      }
    });

    it('should reject values outside the schema', () => {
      const file = writeConfig(JSON.stringify({ orchestrator: { failure_threshold: 0 } }));
      const result = loadConfig(file);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message.startsWith('Invalid configuration:')).toBe(true);
      }
    });

    it('should reject a default timeout longer than a timer can wait', () => {
      const file = writeConfig(JSON.stringify({ orchestrator: { default_timeout_ms: 3_000_000_000 } }));
      const result = loadConfig(file);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message.startsWith('Invalid configuration:')).toBe(true);
      }
    });

    it('should reject a file that is not a JSON object', () => {
      const file = writeConfig('[1, 2]');
      const result = loadConfig(file);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Invalid configuration: ${file} must contain a JSON object`);
      }
    });

    it('should report malformed JSON', () => {
      const result = loadConfig(writeConfig('{ not json'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(SyntaxError);
      }
    });
  });

  describe('saveConfig', () => {
    it('should write a file that loads back to the same configuration', () => {
      const file = path.join(tmpDir, 'nested', 'config.json');
      const config = { ...DEFAULT_CONFIG, logging: { level: 'debug' as const } };

      expect(saveConfig(config, file).success).toBe(true);
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);

      const loaded = loadConfig(file);
      expect(loaded.success).toBe(true);
      if (loaded.success) {
        expect(loaded.data).toEqual(config);
      }
    });
  });

  describe('ensureDirectories', () => {
    it('should create the base and logs directories', () => {
      const baseDir = path.join(tmpDir, 'home');
      const config = { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, base_dir: baseDir } };

      expect(ensureDirectories(config).success).toBe(true);
      expect(fs.statSync(path.join(baseDir, 'logs')).isDirectory()).toBe(true);
    });
  });
});
