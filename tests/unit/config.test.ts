import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { clearConfigCache, getConfig, loadConfig } from '../../apps/api/src/services/config';

const DEFAULT_CONFIG = path.join(process.cwd(), 'config/default.json');
const ENV_KEYS = ['CONFIG_PATH', 'PORT', 'ALLOWED_ORIGINS', 'SOURCE_TIMEOUT_MS', 'CONTACT_EMAIL', 'LOG_LEVEL'];

function writeTempConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'paperlens-config-'));
  const file = path.join(dir, 'config.json');
  fs.writeFileSync(file, content);
  return file;
}

describe('Config Service', () => {
  const savedEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    clearConfigCache();
  });

  function useDefaultConfig() {
    for (const key of ENV_KEYS) delete process.env[key];
    process.env.CONFIG_PATH = DEFAULT_CONFIG;
    clearConfigCache();
  }

  it('loads the default config file', () => {
    useDefaultConfig();
    const config = loadConfig();

    expect(config.server.port).toBe(8000);
    expect(config.search.defaultMaxResults).toBe(5);
    expect(config.search.maxResults).toBe(50);
    expect(config.search.titleSimilarityThreshold).toBe(0.95);
    expect(config.sources.timeoutMs).toBe(30000);
    expect(config.sources.arxiv.baseUrl).toBe('https://export.arxiv.org/api/query');
    expect(config.sources.openalex.baseUrl).toBe('https://api.openalex.org/works');
    expect(config.sources.crossref.baseUrl).toBe('https://api.crossref.org/works');
    expect(config.sources.mailto).toBeUndefined();
    expect(config.logging.level).toBe('info');
  });

  it('caches the loaded config until the cache is cleared', () => {
    useDefaultConfig();
    const first = getConfig();
    expect(getConfig()).toBe(first);

    clearConfigCache();
    expect(getConfig()).not.toBe(first);
  });

  it('applies environment overrides', () => {
    useDefaultConfig();
    process.env.PORT = '9100';
    process.env.ALLOWED_ORIGINS = 'https://a.example, https://b.example';
    process.env.SOURCE_TIMEOUT_MS = '1500';
    process.env.CONTACT_EMAIL = 'team@example.com';
    process.env.LOG_LEVEL = 'debug';

    const config = loadConfig();

    expect(config.server.port).toBe(9100);
    expect(config.server.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.sources.timeoutMs).toBe(1500);
    expect(config.sources.mailto).toBe('team@example.com');
    expect(config.logging.level).toBe('debug');
  });

  it('ignores malformed numeric and log level overrides', () => {
    useDefaultConfig();
    process.env.PORT = 'not-a-port';
    process.env.SOURCE_TIMEOUT_MS = '-5';
    process.env.LOG_LEVEL = 'verbose';

    const config = loadConfig();

    expect(config.server.port).toBe(8000);
    expect(config.sources.timeoutMs).toBe(30000);
    expect(config.logging.level).toBe('info');
  });

  it('throws when the config file is missing', () => {
    useDefaultConfig();
    process.env.CONFIG_PATH = path.join(os.tmpdir(), 'paperlens-missing', 'nope.json');

    expect(() => loadConfig()).toThrow('Configuration file not found or invalid');
  });

  it('throws with the failing field when the config does not match the schema', () => {
    useDefaultConfig();
    const valid = loadConfig();
    const invalid = { ...valid, search: { ...valid.search, titleSimilarityThreshold: 2 } };
    process.env.CONFIG_PATH = writeTempConfig(JSON.stringify(invalid));
    clearConfigCache();

    expect(() => loadConfig()).toThrow(/search\.titleSimilarityThreshold/);
  });
});
