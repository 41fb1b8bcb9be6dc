/**
 * Orchestrator Settings
 *
 * Scheduling, retry and synthesis knobs. Every field has a documented
 * default; an optional JSON file (ORCHESTRATOR_CONFIG_FILE) overrides any
 * subset of them.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

const cadenceSchema = z.enum(['daily', 'weekly', 'monthly', 'quarterly']);

function perCadence(defaults: Record<z.infer<typeof cadenceSchema>, number>) {
  return z
    .object({
      daily: z.number().int().positive().default(defaults.daily),
      weekly: z.number().int().positive().default(defaults.weekly),
      monthly: z.number().int().positive().default(defaults.monthly),
      quarterly: z.number().int().positive().default(defaults.quarterly),
    })
    .default({});
}

const schedulerSchema = z
  .object({
    /** Wait between orchestrator cycles. */
    pollIntervalMs: z.number().int().positive().default(MINUTE),
    /** Max series pipelines running at once. */
    workerConcurrency: z.number().int().positive().default(4),
    jitterMinMs: z.number().int().nonnegative().default(0),
    jitterMaxMs: z.number().int().nonnegative().default(5 * MINUTE),
    backoffBaseMs: z.number().int().positive().default(MINUTE),
    backoffMaxMs: z.number().int().positive().default(6 * HOUR),
    /** Consecutive failures before the alert hook fires. */
    alertThreshold: z.number().int().positive().default(5),
    fetchTimeoutMs: z.number().int().positive().default(30_000),
    shutdownTimeoutMs: z.number().int().positive().default(15_000),
    /** How often a series is polled, by cadence, before jitter. */
    pollIntervalByCadenceMs: perCadence({
      daily: 6 * HOUR,
      weekly: 24 * HOUR,
      monthly: 24 * HOUR,
      quarterly: 72 * HOUR,
    }),
    /** Periods re-requested behind the latest stored one, to catch revisions. */
    revisionLookbackPeriods: perCadence({ daily: 10, weekly: 8, monthly: 6, quarterly: 4 }),
  })
  .default({})
  .refine((s) => s.jitterMinMs <= s.jitterMaxMs, { message: 'jitterMinMs must be <= jitterMaxMs' })
  .refine((s) => s.backoffBaseMs <= s.backoffMaxMs, { message: 'backoffBaseMs must be <= backoffMaxMs' });

const synthesisSchema = z
  .object({
    /** Trailing periods of history given to the model, by cadence. */
    windowPeriods: perCadence({ daily: 90, weekly: 52, monthly: 24, quarterly: 12 }),
    maxContextTokens: z.number().int().positive().default(8000),
    maxOutputTokens: z.number().int().positive().default(1024),
    aiTimeoutMs: z.number().int().positive().default(60_000),
    backlogBackoffBaseMs: z.number().int().positive().default(5 * MINUTE),
    backlogBackoffMaxMs: z.number().int().positive().default(6 * HOUR),
  })
  .default({});

export const orchestratorConfigSchema = z.object({
  scheduler: schedulerSchema,
  synthesis: synthesisSchema,
  seriesOverrides: z
    .record(
      z.object({
        cadence: cadenceSchema.optional(),
        pollIntervalMs: z.number().int().positive().optional(),
      }),
    )
    .default({}),
  /** Restrict the catalog to these keys; all series when absent. */
  enabledSeries: z.array(z.string()).optional(),
});

export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
export type SchedulerConfig = OrchestratorConfig['scheduler'];
export type SynthesisConfig = OrchestratorConfig['synthesis'];

export function parseOrchestratorConfig(input: unknown): OrchestratorConfig {
  const result = orchestratorConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Orchestrator config invalid:\n${issues}`);
  }
  return result.data;
}

export function loadOrchestratorConfig(filePath?: string): OrchestratorConfig {
  if (!filePath) {
    return parseOrchestratorConfig({});
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read orchestrator config ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Orchestrator config ${filePath} is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  return parseOrchestratorConfig(parsed);
}
