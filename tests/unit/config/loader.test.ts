import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import {
  deepMerge,
  defaultConfigPath,
  loadConfig,
  validateConfig,
} from '../../../src/config/loader.js';

describe('Config Loader', () => {
  let testConfigDir: string;

  const writeConfig = (document: unknown): string => {
    const configPath = join(testConfigDir, 'runtime.yaml');
    writeFileSync(configPath, yaml.dump(document, { skipInvalid: true }));
    return configPath;
  };

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'slotswap-config-'));
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
  });

  describe('shipped runtime.yaml', () => {
    it('loads production values', () => {
      const config = loadConfig(defaultConfigPath(), 'production');

      expect(config.server).toMatchObject({ host: '0.0.0.0', port: 5000 });
      expect(config.supervisor.group_template).toBe('{model}-{slot}');
      expect(config.workers.base_port).toBe(5005);
      expect(config.lifecycle.readiness_timeout_ms).toBe(300000);
      expect(config.artifacts.root_dir).toBe(resolve('./data/model'));
      expect(config.logging.level).toBe('info');
    });

    it('applies the test environment overrides', () => {
      const config = loadConfig(defaultConfigPath(), 'test');

      expect(config.server).toMatchObject({ host: '127.0.0.1', port: 0 });
      expect(config.lifecycle).toMatchObject({
        readiness_timeout_ms: 5000,
        readiness_poll_interval_ms: 50,
        health_check_interval_ms: 0,
        unhealthy_threshold: 3,
      });
      expect(config.artifacts.restore_on_startup).toBe(false);
      expect(config.logging.level).toBe('silent');
    });

    it('applies the development environment overrides', () => {
      expect(loadConfig(defaultConfigPath(), 'development').logging.level).toBe('debug');
    });
  });

  describe('custom files', () => {
    it('merges environment overrides into a custom file', () => {
      const base = loadConfig(defaultConfigPath(), 'production');
      const configPath = writeConfig({
        ...base,
        workers: { ...base.workers, ports: { greeter: { A: 8001, B: 8002 } } },
        environments: { test: { server: { port: 6123 } } },
      });

      const config = loadConfig(configPath, 'test');

      expect(config.server.port).toBe(6123);
      expect(config.server.host).toBe('0.0.0.0');
      expect(config.workers.ports).toEqual({ greeter: { A: 8001, B: 8002 } });
    });

    it('reports every invalid field', () => {
      const base = loadConfig(defaultConfigPath(), 'production');
      const configPath = writeConfig({
        ...base,
        supervisor: { ...base.supervisor, group_template: '{model}' },
        lifecycle: { ...base.lifecycle, readiness_timeout_ms: 10 },
      });

      expect(() => loadConfig(configPath, 'production')).toThrow(
        'Configuration validation failed:\n' +
          'supervisor.group_template must contain {model} and {slot} placeholders\n' +
          'lifecycle.readiness_timeout_ms must be >= 1000ms'
      );
    });

    it('rejects a file that is not a mapping', () => {
      const configPath = writeConfig(['not', 'a', 'mapping']);

      expect(() => loadConfig(configPath)).toThrow(/must contain a YAML mapping/);
    });

    it('reports a missing file', () => {
      const missing = join(testConfigDir, 'absent.yaml');

      expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
    });
  });

  describe('validateConfig', () => {
    it('rejects a readiness timeout shorter than the poll interval', () => {
      const base = loadConfig(defaultConfigPath(), 'production');

      expect(() =>
        validateConfig({
          ...base,
          lifecycle: { ...base.lifecycle, readiness_timeout_ms: 1000, readiness_poll_interval_ms: 2000 },
        })
      ).toThrow('lifecycle.readiness_timeout_ms must be greater than readiness_poll_interval_ms');
    });
  });

  describe('deepMerge', () => {
    it('merges nested objects and replaces scalars and arrays', () => {
      expect(
        deepMerge(
          { a: { b: 1, c: [1, 2] }, d: 'x' },
          { a: { c: [3] }, d: 'y', e: undefined }
        )
      ).toEqual({ a: { b: 1, c: [3] }, d: 'y' });
    });
  });
});
