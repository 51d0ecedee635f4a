import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig, parseConfig } from '../../src/runner/config.js';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig({})).toEqual({
      host: {},
      router: { name: 'router', namespace: 'default', recencySeconds: 30, logIdleTimeoutSeconds: 60 },
      settings: { level: 'info', checks: [] },
    });
  });

  it('keeps explicit settings', () => {
    const config = parseConfig({
      cluster: { context: 'admin' },
      host: { nodeConfig: '/etc/origin/node/node-config.yaml' },
      router: { name: 'ingress-router', recencySeconds: 5 },
      settings: { level: 'debug', checks: ['ClusterRouter'] },
    });

    expect(config.cluster).toEqual({ context: 'admin' });
    expect(config.router).toEqual({ name: 'ingress-router', namespace: 'default', recencySeconds: 5, logIdleTimeoutSeconds: 60 });
    expect(config.settings).toEqual({ level: 'debug', checks: ['ClusterRouter'] });
  });

  it('lists every problem in the error', () => {
    expect(() => parseConfig({ router: { recencySeconds: 0 }, settings: { level: 'loud' } })).toThrow(
      "Invalid config:\n  router.recencySeconds: Number must be greater than 0\n" +
      "  settings.level: Invalid enum value. Expected 'debug' | 'info' | 'warning' | 'error', received 'loud'",
    );
  });
});

describe('loadConfig', () => {
  it('reads YAML from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'diagnostics-config-'));
    const file = path.join(dir, 'diagnostics.yaml');
    fs.writeFileSync(file, 'host:\n  masterConfig: /etc/origin/master/master-config.yaml\n');

    try {
      expect(loadConfig(file).host).toEqual({ masterConfig: '/etc/origin/master/master-config.yaml' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('accepts an empty file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'diagnostics-config-'));
    const file = path.join(dir, 'diagnostics.yaml');
    fs.writeFileSync(file, '');

    try {
      expect(loadConfig(file).settings.level).toBe('info');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig('/nonexistent/diagnostics.yaml')).toThrow('Config file not found: /nonexistent/diagnostics.yaml');
  });
});
