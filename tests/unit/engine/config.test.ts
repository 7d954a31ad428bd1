/**
 * Engine Config Tests
 *
 * Defaults, HCS_* variables, .env precedence, overrides and validation.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  configFromEnv,
  defaultConfig,
  loadEngineConfig,
  mergeConfig,
  parseEngineConfig,
} from '../../../src/engine/config.js';
import { EngineError } from '../../../src/engine/errors.js';
import { cleanupTestDir, createTestDir } from '../helpers.js';

describe('Engine config', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('hcs-config-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // DEFAULTS
  // ═══════════════════════════════════════════════════════════════════════════

  it('has documented defaults', () => {
    expect(defaultConfig.name).toBe('content-store');
    expect(defaultConfig.vectorBackend).toBe('sqlite-vec');
    expect(defaultConfig.chunkSize).toBe(2000);
    expect(defaultConfig.chunkOverlapPercent).toBe(10);
    expect(defaultConfig.policyVersion).toBe(1);
    expect(defaultConfig.policyMargins).toEqual({ sizeMarginDecades: 0.5, scoreMargin: 0.2 });
    expect(defaultConfig.retry).toEqual({ maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 10_000 });
    expect(defaultConfig.hybridAlpha).toBe(0.5);
    expect(defaultConfig.optimizer.minSamples).toBe(50);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // ENVIRONMENT
  // ═══════════════════════════════════════════════════════════════════════════

  describe('configFromEnv()', () => {
    it('maps HCS_* variables onto config paths', () => {
      expect(
        configFromEnv({
          HCS_CHUNK_SIZE: '500',
          HCS_VECTOR_BACKEND: 'memory',
          HCS_RETRY_MAX_ATTEMPTS: '5',
          HCS_HYBRID_ALPHA: '0.25',
          UNRELATED: 'ignored',
        })
      ).toEqual({
        chunkSize: 500,
        vectorBackend: 'memory',
        retry: { maxAttempts: 5 },
        hybridAlpha: 0.25,
      });
    });

    it('skips empty values', () => {
      expect(configFromEnv({ HCS_CHUNK_SIZE: '' })).toEqual({});
    });

    it('rejects a non-numeric value', () => {
      let caught: unknown;
      try {
        configFromEnv({ HCS_CHUNK_SIZE: 'large' });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(EngineError);
      expect(caught).toMatchObject({
        category: 'CONFIGURATION_ERROR',
        message: 'Invalid numeric env var HCS_CHUNK_SIZE: "large"',
      });
    });
  });

  describe('loadEngineConfig()', () => {
    it('reads a .env file without overriding variables already set', () => {
      const envPath = join(testDir, '.env');
      writeFileSync(envPath, 'HCS_CHUNK_SIZE=800\nHCS_HYBRID_ALPHA=0.9\n');

      const config = loadEngineConfig({ envPath, env: { HCS_HYBRID_ALPHA: '0.3' } });
      expect(config.chunkSize).toBe(800);
      expect(config.hybridAlpha).toBe(0.3);
    });

    it('lets explicit overrides win over the environment', () => {
      const config = loadEngineConfig({
        env: { HCS_CHUNK_SIZE: '800', HCS_RETRY_BASE_DELAY_MS: '50' },
        overrides: { chunkSize: 1200, retry: { maxAttempts: 7 } },
      });
      expect(config.chunkSize).toBe(1200);
      expect(config.retry).toEqual({ maxAttempts: 7, baseDelayMs: 50, maxDelayMs: 10_000 });
    });

    it('ignores a missing .env file', () => {
      const config = loadEngineConfig({ envPath: join(testDir, 'missing.env'), env: {} });
      expect(config).toEqual(defaultConfig);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // VALIDATION AND MERGING
  // ═══════════════════════════════════════════════════════════════════════════

  describe('parseEngineConfig()', () => {
    it('lists every failing path', () => {
      expect(() => parseEngineConfig({ chunkSize: 10, hybridAlpha: 2 })).toThrow(
        /Invalid engine config: chunkSize: .*; hybridAlpha: /
      );
    });

    it('rejects an unknown vector backend', () => {
      expect(() => parseEngineConfig({ vectorBackend: 'faiss' })).toThrow(EngineError);
    });
  });

  describe('mergeConfig()', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = mergeConfig(
        { retry: { maxAttempts: 3, baseDelayMs: 200 }, policyOverrides: [{ domain: 'a' }] },
        { retry: { maxAttempts: 9 }, policyOverrides: [], chunkSize: undefined }
      );
      expect(merged).toEqual({ retry: { maxAttempts: 9, baseDelayMs: 200 }, policyOverrides: [] });
    });
  });
});
