import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const unitInterval = z.coerce.number().min(0).max(1);

const configSchema = z
  .object({
    // App
    logLevel: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    databasePath: z.string().optional(), // Defaults to <root>/data/companion.db

    // Intent engine
    patternsPath: z.string().optional(), // Defaults to the bundled rule file
    maxInputLength: z.coerce.number().int().positive().default(2000),
    specificThreshold: unitInterval.default(0.4),
    fallbackThreshold: unitInterval.default(0.3),
    multiMatchStep: unitInterval.default(0.1),
    multiMatchCap: unitInterval.default(0.3),
    longMatchMinLength: z.coerce.number().int().nonnegative().default(10),
    longMatchBonus: unitInterval.default(0.05),
    contextNudgeCap: unitInterval.default(0.15),
    recentCategoryNudge: unitInterval.default(0.05),
    recentCategoryWindow: z.coerce.number().int().nonnegative().default(3),

    // Activity tracking / interaction log
    activityHistoryLimit: z.coerce.number().int().positive().default(50),
    interactionLogMaxEntries: z.coerce.number().int().positive().default(1000),
  })
  .refine((c) => c.fallbackThreshold < c.specificThreshold, {
    message: 'fallback threshold must be lower than the specific threshold',
    path: ['fallbackThreshold'],
  });

export type Config = z.infer<typeof configSchema>;

const ENV_KEYS = {
  logLevel: 'LOG_LEVEL',
  databasePath: 'DATABASE_PATH',
  patternsPath: 'INTENT_PATTERNS_PATH',
  maxInputLength: 'INTENT_MAX_INPUT_LENGTH',
  specificThreshold: 'INTENT_SPECIFIC_THRESHOLD',
  fallbackThreshold: 'INTENT_FALLBACK_THRESHOLD',
  multiMatchStep: 'INTENT_MULTI_MATCH_STEP',
  multiMatchCap: 'INTENT_MULTI_MATCH_CAP',
  longMatchMinLength: 'INTENT_LONG_MATCH_MIN_LENGTH',
  longMatchBonus: 'INTENT_LONG_MATCH_BONUS',
  contextNudgeCap: 'INTENT_CONTEXT_NUDGE_CAP',
  recentCategoryNudge: 'INTENT_RECENT_CATEGORY_NUDGE',
  recentCategoryWindow: 'INTENT_RECENT_CATEGORY_WINDOW',
  activityHistoryLimit: 'ACTIVITY_HISTORY_LIMIT',
  interactionLogMaxEntries: 'INTERACTION_LOG_MAX_ENTRIES',
} as const satisfies Record<keyof Config, string>;

/** Empty variables count as unset. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = source[key];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`, { cause: parsed.error });
  }
  return parsed.data;
}

export const config = loadConfig();
