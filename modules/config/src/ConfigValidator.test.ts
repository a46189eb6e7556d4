// ConfigValidator 单元测试

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigValidator } from './ConfigValidator.js';
import type { RelationshipsConfig } from './types.js';

describe('ConfigValidator', () => {
  let validator: ConfigValidator;

  beforeEach(() => {
    validator = new ConfigValidator();
  });

  describe('validate()', () => {
    it('accepts a valid config', () => {
      const validConfig: RelationshipsConfig = {
        destructionCascade: { enabled: true },
        logging: { debug: true, logDir: '/tmp/relationship-logs' }
      };

      const result = validator.validate(validConfig);

      assert.strictEqual(result.valid, true);
      assert.strictEqual(result.errors, undefined);
    });

    it('reports missing required sections', () => {
      const result = validator.validate({ destructionCascade: { enabled: false } });

      assert.strictEqual(result.valid, false);
      assert.deepStrictEqual(result.errors, [
        { path: '/root', message: "must have required property 'logging'" }
      ]);
    });

    it('reports wrong field types', () => {
      const result = validator.validate({
        destructionCascade: { enabled: 1 },
        logging: { debug: false }
      });

      assert.strictEqual(result.valid, false);
      assert.deepStrictEqual(result.errors, [
        { path: '/destructionCascade/enabled', message: 'must be boolean' }
      ]);
    });

    it('rejects unknown properties', () => {
      const result = validator.validate({
        destructionCascade: { enabled: false },
        logging: { debug: false },
        persistence: true
      });

      assert.strictEqual(result.valid, false);
      assert.deepStrictEqual(result.errors, [
        { path: '/root', message: 'must NOT have additional properties' }
      ]);
    });
  });

  describe('isConfig()', () => {
    it('narrows valid input', () => {
      const input: unknown = { destructionCascade: { enabled: true }, logging: { debug: false } };

      assert.strictEqual(validator.isConfig(input), true);
      assert.strictEqual(validator.isConfig({}), false);
    });
  });

  describe('validateFile()', () => {
    it('validates a config file', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relationships-validator-'));
      try {
        const file = path.join(dir, 'config.json');
        await fs.writeFile(file, JSON.stringify(validator.getDefaultConfig()), 'utf-8');

        const result = await validator.validateFile(file);

        assert.strictEqual(result.valid, true);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it('reports a missing file', async () => {
      const file = path.join(os.tmpdir(), 'relationships-validator-missing', 'config.json');

      const result = await validator.validateFile(file);

      assert.strictEqual(result.valid, false);
      assert.strictEqual(result.errors?.[0].path, file);
    });

    it('reports malformed JSON', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relationships-validator-'));
      try {
        const file = path.join(dir, 'config.json');
        await fs.writeFile(file, '{ not json', 'utf-8');

        const result = await validator.validateFile(file);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.errors?.length, 1);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('getDefaultConfig()', () => {
    it('returns a config that passes validation', () => {
      const defaultConfig = validator.getDefaultConfig();

      assert.deepStrictEqual(defaultConfig, {
        destructionCascade: { enabled: false },
        logging: { debug: false }
      });
      assert.strictEqual(validator.validate(defaultConfig).valid, true);
    });
  });
});
