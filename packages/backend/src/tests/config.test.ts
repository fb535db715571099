import { describe, it, expect, afterEach, vi } from 'vitest';
import { defaultTransitions } from '../engine/graph/index.js';
import {
  configFromEnv,
  getWorkManagerConfig,
  resetWorkManagerConfigCache,
  resolveConfig,
} from '../lib/config/work-manager.js';
import { ValidationError } from '../lib/errors.js';

describe('resolveConfig', () => {
  it('fills every default', () => {
    const config = resolveConfig();

    expect(config.lease).toEqual({
      backend: 'database',
      ttlSeconds: 600,
      heartbeatEverySeconds: 120,
      redisPrefix: 'work:lease:',
      maxLeasesPerHolder: null,
      maxLeasesPerType: null,
      typeLimits: {},
    });
    expect(config.retry).toEqual({ defaultMaxAttempts: 3, backoffSeconds: 60, jitterSeconds: 20, maxApplyAttempts: 3 });
    expect(config.idempotency).toEqual({
      header: 'X-Idempotency-Key',
      enforceOn: ['submit', 'propose', 'approve', 'reject'],
      retentionHours: 24,
      waitTimeoutMs: 5000,
      pollIntervalMs: 50,
    });
    expect(config.partials).toEqual({ enabled: true, maxPartsPerItem: 100, maxPayloadBytes: 1048576 });
    expect(config.rework.policy).toBe('reset');
    expect(config.transitions).toEqual(defaultTransitions);
  });

  it('merges overrides section by section', () => {
    const config = resolveConfig({ lease: { ttlSeconds: 30 }, retry: { jitterSeconds: 0 } });

    expect(config.lease.ttlSeconds).toBe(30);
    expect(config.lease.backend).toBe('database');
    expect(config.retry).toMatchObject({ jitterSeconds: 0, backoffSeconds: 60 });
  });

  it('reports malformed values with their path', () => {
    const error = (() => {
      try {
        resolveConfig({ lease: { ttlSeconds: -5 } });
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Invalid work manager configuration',
      details: { errors: [{ path: 'lease.ttlSeconds' }] },
    });
  });

  it('rejects transition tables that name unknown states', () => {
    expect(() =>
      resolveConfig({
        transitions: { order: { ...defaultTransitions.order, queued: ['checked_out', 'paused'] } },
      }),
    ).toThrow('Invalid transition configuration');
  });
});

describe('configFromEnv', () => {
  it('maps WORK_* variables onto the config', () => {
    const config = resolveConfig(
      configFromEnv({
        WORK_LEASE_BACKEND: 'redis',
        WORK_LEASE_TTL: '120',
        WORK_MAX_LEASES_PER_AGENT: '4',
        WORK_IDEMPOTENCY_ENFORCE_ON: 'submit, approve',
        WORK_PARTIALS_ENABLED: 'false',
        WORK_REWORK_POLICY: 'replan',
      }),
    );

    expect(config.lease).toMatchObject({ backend: 'redis', ttlSeconds: 120, maxLeasesPerHolder: 4 });
    expect(config.idempotency.enforceOn).toEqual(['submit', 'approve']);
    expect(config.partials.enabled).toBe(false);
    expect(config.rework.policy).toBe('replan');
    expect(config.database.path).toBe('work-orders.db');
  });

  it('leaves unset variables to the defaults', () => {
    expect(resolveConfig(configFromEnv({}))).toEqual(resolveConfig());
  });

  it('rejects unknown idempotent operations', () => {
    expect(() => configFromEnv({ WORK_IDEMPOTENCY_ENFORCE_ON: 'submit,delete' })).toThrow(
      "Unknown idempotent operation 'delete' in WORK_IDEMPOTENCY_ENFORCE_ON",
    );
  });

  it('rejects malformed values', () => {
    expect(() => configFromEnv({ WORK_LEASE_BACKEND: 'memcached' })).toThrow('Invalid work manager environment');
    expect(() => configFromEnv({ WORK_ENABLE_ALERTS: 'yes' })).toThrow(ValidationError);
  });
});

describe('getWorkManagerConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetWorkManagerConfigCache();
  });

  it('reads the environment once until the cache is reset', () => {
    vi.stubEnv('WORK_LEASE_TTL', '90');
    resetWorkManagerConfigCache();
    expect(getWorkManagerConfig().lease.ttlSeconds).toBe(90);

    vi.stubEnv('WORK_LEASE_TTL', '45');
    expect(getWorkManagerConfig().lease.ttlSeconds).toBe(90);

    resetWorkManagerConfigCache();
    expect(getWorkManagerConfig().lease.ttlSeconds).toBe(45);
  });
});
