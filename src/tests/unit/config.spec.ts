import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  DATA_DIR_ENV,
  expandEnv,
  loadConfiguration,
  parseConfiguration,
  platformDataDir,
  resolveStorageDir,
  resolveStorageLayout,
} from '../../config.js';

const tempDirs: string[] = [];
const makeTempDir = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolrun-config-'));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  tempDirs.splice(0).forEach((dir) => { fs.rmSync(dir, { recursive: true, force: true }); });
});

describe('parseConfiguration', () => {
  it('fills every section with defaults', () => {
    const config = parseConfiguration({}, 'test', {});
    expect(config.storageDir).toBeUndefined();
    expect(config.cache).toEqual({ maxEntries: 1000 });
    expect(config.artifacts).toEqual({ inlineThresholdBytes: 1_000_000, maxAge: 86_400_000 });
    expect(config.timeouts).toEqual({ defaultMs: 30_000, maxRetries: 3, retryOnTimeout: true });
    expect(config.monitoring).toEqual({ enabled: true, traceRetention: 604_800_000, metricsRetention: 2_592_000_000 });
    expect(config.toolPolicies).toEqual({});
    expect(config.logging.format).toBe('logfmt');
  });

  it('accepts durations as milliseconds or with units', () => {
    const config = parseConfiguration({ monitoring: { traceRetention: '5m' }, artifacts: { maxAge: 1500 } }, 'test', {});
    expect(config.monitoring.traceRetention).toBe(300_000);
    expect(config.artifacts.maxAge).toBe(1500);
  });

  it('expands environment variables in string values', () => {
    const config = parseConfiguration({ storageDir: '${DATA}/toolrun', monitoring: { dir: '${MISSING}mon' } }, 'test', { DATA: '/srv' });
    expect(config.storageDir).toBe('/srv/toolrun');
    expect(config.monitoring.dir).toBe('mon');
  });

  it('reports each invalid field with its path', () => {
    expect(() => parseConfiguration({ monitoring: { traceRetention: 'soon' } }, 'test.json', {})).toThrow(
      'Configuration validation failed in test.json:\n  monitoring.traceRetention: expected milliseconds or a duration like 5m/2h/7d',
    );
    expect(() => parseConfiguration({ toolPolicies: { web_search: 'forever' } }, 'test.json', {})).toThrow(/toolPolicies\.web_search/);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfiguration({ cache: { size: 10 } }, 'test.json', {})).toThrow(/Unrecognized key/);
  });
});

describe('expandEnv', () => {
  it('substitutes set variables and blanks unset ones', () => {
    expect(expandEnv('${HOME}/data', { HOME: '/home/u' })).toBe('/home/u/data');
    expect(expandEnv('a${NOPE}b', {})).toBe('ab');
    expect(expandEnv('no vars', {})).toBe('no vars');
  });
});

describe('loadConfiguration', () => {
  it('reads an explicit file', () => {
    const file = path.join(makeTempDir(), 'toolrun.json');
    fs.writeFileSync(file, JSON.stringify({ timeouts: { defaultMs: 5000 }, toolPolicies: { web_search: 'no_cache' } }));
    const config = loadConfiguration(file, {});
    expect(config.timeouts.defaultMs).toBe(5000);
    expect(config.toolPolicies).toEqual({ web_search: 'no_cache' });
  });

  it('fails when an explicit file is missing or not JSON', () => {
    const dir = makeTempDir();
    const missing = path.join(dir, 'missing.json');
    expect(() => loadConfiguration(missing, {})).toThrow(`Configuration file not found: ${missing}`);
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ not json');
    expect(() => loadConfiguration(broken, {})).toThrow(`Invalid JSON in configuration file ${broken}`);
  });
});

describe('storage layout', () => {
  it('prefers the configured directory, then the environment, then the platform default', () => {
    expect(resolveStorageDir({ storageDir: '/data/tr' }, { [DATA_DIR_ENV]: '/env/tr' })).toBe('/data/tr');
    expect(resolveStorageDir({}, { [DATA_DIR_ENV]: '/env/tr' })).toBe('/env/tr');
    expect(resolveStorageDir({}, { [DATA_DIR_ENV]: '', XDG_DATA_HOME: '/xdg' })).toBe(platformDataDir(process.platform, { XDG_DATA_HOME: '/xdg' }));
  });

  it('follows platform conventions', () => {
    expect(platformDataDir('linux', { XDG_DATA_HOME: '/xdg' }, '/home/u')).toBe('/xdg/toolrun');
    expect(platformDataDir('linux', {}, '/home/u')).toBe('/home/u/.local/share/toolrun');
    expect(platformDataDir('darwin', {}, '/home/u')).toBe('/home/u/Library/Application Support/toolrun');
    expect(platformDataDir('win32', {}, '/home/u')).toBe(path.join('/home/u', 'AppData', 'Local', 'toolrun'));
  });

  it('places traces and metrics under the monitoring directory', () => {
    const config = parseConfiguration({ storageDir: '/data/tr' }, 'test', {});
    expect(resolveStorageLayout(config, {})).toEqual({
      root: '/data/tr',
      artifactsDir: '/data/tr',
      tracesDir: '/data/tr/monitoring/traces',
      metricsDir: '/data/tr/monitoring/metrics',
    });
    const split = parseConfiguration({ storageDir: '/data/tr', artifacts: { dir: '/blobs' }, monitoring: { dir: '/mon' } }, 'test', {});
    expect(resolveStorageLayout(split, {})).toMatchObject({ artifactsDir: '/blobs', tracesDir: '/mon/traces', metricsDir: '/mon/metrics' });
  });
});
