import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { buildLifecycles, defaultTransitions, TransitionTableSchema } from '../../engine/graph/index.js';

// ============================================================================
// Schema
// ============================================================================

export const IDEMPOTENT_OPERATIONS = [
  'propose',
  'submit',
  'submit-part',
  'finalize',
  'approve',
  'reject',
] as const;

export type IdempotentOperation = (typeof IDEMPOTENT_OPERATIONS)[number];

const limit = z.number().int().positive().nullable();

const LeaseConfigSchema = z.object({
  backend: z.enum(['database', 'redis']).default('database'),
  ttlSeconds: z.number().int().positive().default(600),
  heartbeatEverySeconds: z.number().int().positive().default(120),
  redisPrefix: z.string().default('work:lease:'),
  maxLeasesPerHolder: limit.default(null),
  maxLeasesPerType: limit.default(null),
  /** Per order-type overrides of maxLeasesPerType. */
  typeLimits: z.record(z.string(), z.number().int().positive()).default({}),
});

const RetryConfigSchema = z.object({
  defaultMaxAttempts: z.number().int().positive().default(3),
  backoffSeconds: z.number().int().nonnegative().default(60),
  jitterSeconds: z.number().int().nonnegative().default(20),
  maxApplyAttempts: z.number().int().positive().default(3),
});

const IdempotencyConfigSchema = z.object({
  header: z.string().min(1).default('X-Idempotency-Key'),
  enforceOn: z.array(z.enum(IDEMPOTENT_OPERATIONS)).default(['submit', 'propose', 'approve', 'reject']),
  retentionHours: z.number().positive().default(24),
  /** How long a duplicate waits for an in-flight request before giving up. */
  waitTimeoutMs: z.number().int().positive().default(5000),
  pollIntervalMs: z.number().int().positive().default(50),
});

const PartialsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxPartsPerItem: z.number().int().positive().default(100),
  maxPayloadBytes: z.number().int().positive().default(1048576),
});

const MaintenanceConfigSchema = z.object({
  deadLetterAfterHours: z.number().positive().default(48),
  staleOrderThresholdHours: z.number().positive().default(24),
  enableAlerts: z.boolean().default(true),
  reclaimPattern: z.string().default('* * * * *'),
  sweepPattern: z.string().default('*/15 * * * *'),
});

const ReworkConfigSchema = z.object({
  /**
   * What happens to a rejected order's items when it is sent back for rework:
   * `reset` requeues them with results discarded, `replan` dead-letters them
   * and asks the order type for a fresh plan.
   */
  policy: z.enum(['reset', 'replan']).default('reset'),
});

export const WorkManagerConfigSchema = z.object({
  database: z.object({ path: z.string().default('work-orders.db') }).default({}),
  lease: LeaseConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  idempotency: IdempotencyConfigSchema.default({}),
  partials: PartialsConfigSchema.default({}),
  maintenance: MaintenanceConfigSchema.default({}),
  rework: ReworkConfigSchema.default({}),
  transitions: z
    .object({
      order: TransitionTableSchema.default(defaultTransitions.order),
      item: TransitionTableSchema.default(defaultTransitions.item),
    })
    .default({}),
});

export type WorkManagerConfig = z.infer<typeof WorkManagerConfigSchema>;
export type WorkManagerConfigInput = z.input<typeof WorkManagerConfigSchema>;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Fill defaults and validate a configuration object, including the
 * referential integrity of both transition graphs.
 * Throws ValidationError when anything is malformed.
 */
export function resolveConfig(input: WorkManagerConfigInput = {}): WorkManagerConfig {
  const parsed = WorkManagerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid work manager configuration', {
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  buildLifecycles(parsed.data.transitions);
  return parsed.data;
}

const optionalInt = z.coerce.number().int().optional();
const optionalBool = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')
  .optional();
const optionalList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  )
  .optional();

const EnvSchema = z.object({
  WORK_DB_PATH: z.string().optional(),
  WORK_LEASE_BACKEND: z.enum(['database', 'redis']).optional(),
  WORK_LEASE_TTL: optionalInt,
  WORK_LEASE_HEARTBEAT_EVERY: optionalInt,
  WORK_MAX_LEASES_PER_AGENT: optionalInt,
  WORK_MAX_LEASES_PER_TYPE: optionalInt,
  WORK_DEFAULT_MAX_ATTEMPTS: optionalInt,
  WORK_BACKOFF_SECONDS: optionalInt,
  WORK_JITTER_SECONDS: optionalInt,
  WORK_MAX_APPLY_ATTEMPTS: optionalInt,
  WORK_IDEMPOTENCY_HEADER: z.string().optional(),
  WORK_IDEMPOTENCY_ENFORCE_ON: optionalList,
  WORK_IDEMPOTENCY_RETENTION_HOURS: optionalInt,
  WORK_PARTIALS_ENABLED: optionalBool,
  WORK_PARTIALS_MAX_PARTS: optionalInt,
  WORK_PARTIALS_MAX_PAYLOAD_BYTES: optionalInt,
  WORK_DEAD_LETTER_AFTER_HOURS: optionalInt,
  WORK_STALE_ORDER_THRESHOLD_HOURS: optionalInt,
  WORK_ENABLE_ALERTS: optionalBool,
  WORK_REWORK_POLICY: z.enum(['reset', 'replan']).optional(),
});

/**
 * Map WORK_* environment variables onto a config input. Unset variables are
 * left out so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): WorkManagerConfigInput {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid work manager environment', {
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  const e = parsed.data;

  const enforceOn = e.WORK_IDEMPOTENCY_ENFORCE_ON?.map((operation) => {
    const known = IDEMPOTENT_OPERATIONS.find((candidate) => candidate === operation);
    if (!known) {
      throw new ValidationError(`Unknown idempotent operation '${operation}' in WORK_IDEMPOTENCY_ENFORCE_ON`);
    }
    return known;
  });

  return {
    database: { path: e.WORK_DB_PATH },
    lease: {
      backend: e.WORK_LEASE_BACKEND,
      ttlSeconds: e.WORK_LEASE_TTL,
      heartbeatEverySeconds: e.WORK_LEASE_HEARTBEAT_EVERY,
      maxLeasesPerHolder: e.WORK_MAX_LEASES_PER_AGENT,
      maxLeasesPerType: e.WORK_MAX_LEASES_PER_TYPE,
    },
    retry: {
      defaultMaxAttempts: e.WORK_DEFAULT_MAX_ATTEMPTS,
      backoffSeconds: e.WORK_BACKOFF_SECONDS,
      jitterSeconds: e.WORK_JITTER_SECONDS,
      maxApplyAttempts: e.WORK_MAX_APPLY_ATTEMPTS,
    },
    idempotency: {
      header: e.WORK_IDEMPOTENCY_HEADER,
      enforceOn,
      retentionHours: e.WORK_IDEMPOTENCY_RETENTION_HOURS,
    },
    partials: {
      enabled: e.WORK_PARTIALS_ENABLED,
      maxPartsPerItem: e.WORK_PARTIALS_MAX_PARTS,
      maxPayloadBytes: e.WORK_PARTIALS_MAX_PAYLOAD_BYTES,
    },
    maintenance: {
      deadLetterAfterHours: e.WORK_DEAD_LETTER_AFTER_HOURS,
      staleOrderThresholdHours: e.WORK_STALE_ORDER_THRESHOLD_HOURS,
      enableAlerts: e.WORK_ENABLE_ALERTS,
    },
    rework: { policy: e.WORK_REWORK_POLICY },
  };
}

let cachedConfig: WorkManagerConfig | undefined;

/**
 * Resolve configuration from the environment once per process.
 * Throws ValidationError on malformed values or transition tables.
 */
export function getWorkManagerConfig(): WorkManagerConfig {
  if (cachedConfig === undefined) {
    cachedConfig = resolveConfig(configFromEnv());
  }
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetWorkManagerConfigCache(): void {
  cachedConfig = undefined;
}
