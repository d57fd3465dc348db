import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { getDatabase } from '../database.js';
import { config } from '../../config/index.js';
import { ACTIVITY_TYPES } from '../../core/intent/contextNudges.js';
import { INTENT_CATEGORIES } from '../../core/intent/types.js';
import type { EntityMap, IntentCategory } from '../../core/intent/types.js';
import type {
  InteractionLogPort,
  InteractionRecord,
  LoggedInteraction,
} from '../../ports/InteractionLogPort.js';
import { StorageError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ component: 'interaction-log' });

const stringList = z.array(z.string()).default([]);

const entitiesSchema = z.object({
  url: stringList,
  filePath: stringList,
  email: stringList,
  number: stringList,
  time: stringList,
});

const interactionRowSchema = z.object({
  id: z.number(),
  input: z.string(),
  category: z.enum(INTENT_CATEGORIES),
  confidence: z.number(),
  resolution: z.enum(['matched', 'fallback']),
  matched_rule_count: z.number(),
  entities: z.string(),
  foreground_app: z.string().nullable(),
  activity_type: z.enum(ACTIVITY_TYPES).nullable(),
  created_at: z.number(),
});

type InteractionRow = z.infer<typeof interactionRowSchema>;

const countRowSchema = z.object({ category: z.enum(INTENT_CATEGORIES), count: z.number() });

function parseEntities(json: string): EntityMap {
  try {
    return entitiesSchema.parse(JSON.parse(json));
  } catch (error) {
    throw new StorageError('Stored entities are not valid', { cause: error });
  }
}

function toInteraction(value: unknown): LoggedInteraction {
  const parsed = interactionRowSchema.safeParse(value);
  if (!parsed.success) {
    throw new StorageError('Interaction row does not match the expected shape', {
      cause: parsed.error,
    });
  }
  const row: InteractionRow = parsed.data;

  const interaction: LoggedInteraction = {
    id: row.id,
    input: row.input,
    category: row.category,
    confidence: row.confidence,
    resolution: row.resolution,
    matchedRuleCount: row.matched_rule_count,
    entities: parseEntities(row.entities),
    createdAt: new Date(row.created_at),
  };
  if (row.foreground_app !== null) {
    interaction.foregroundApp = row.foreground_app;
  }
  if (row.activity_type !== null) {
    interaction.activityType = row.activity_type;
  }
  return interaction;
}

function escapeLike(query: string): string {
  return query.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class InteractionLogRepository implements InteractionLogPort {
  private readonly db: Database;

  constructor(
    db?: Database,
    private readonly maxEntries: number = config.interactionLogMaxEntries
  ) {
    this.db = db || getDatabase();
  }

  record(interaction: InteractionRecord, now: number = Date.now()): LoggedInteraction {
    const { result } = interaction;
    const stmt = this.db.prepare(`
      INSERT INTO interactions
        (input, category, confidence, resolution, matched_rule_count, entities, foreground_app, activity_type, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const info = stmt.run(
      result.input,
      result.category,
      result.confidence,
      result.resolution,
      result.matchedRuleCount,
      JSON.stringify(result.entities),
      interaction.foregroundApp ?? null,
      interaction.activityType ?? null,
      now
    );

    const pruned = this.prune(this.maxEntries);
    if (pruned > 0) {
      logger.debug({ pruned }, 'Pruned interaction log');
    }

    const logged: LoggedInteraction = {
      id: Number(info.lastInsertRowid),
      input: result.input,
      category: result.category,
      confidence: result.confidence,
      resolution: result.resolution,
      matchedRuleCount: result.matchedRuleCount,
      entities: result.entities,
      createdAt: new Date(now),
    };
    if (interaction.foregroundApp !== undefined) {
      logged.foregroundApp = interaction.foregroundApp;
    }
    if (interaction.activityType !== undefined) {
      logged.activityType = interaction.activityType;
    }
    return logged;
  }

  /** Newest first. */
  getRecent(limit = 10, category?: IntentCategory): LoggedInteraction[] {
    const rows = category
      ? this.db
          .prepare(
            'SELECT * FROM interactions WHERE category = ? ORDER BY created_at DESC, id DESC LIMIT ?'
          )
          .all(category, limit)
      : this.db
          .prepare('SELECT * FROM interactions ORDER BY created_at DESC, id DESC LIMIT ?')
          .all(limit);

    return rows.map(toInteraction);
  }

  /** Oldest first, so the most recent category is last. */
  getRecentCategories(limit: number): IntentCategory[] {
    return this.getRecent(limit)
      .map((interaction) => interaction.category)
      .reverse();
  }

  countByCategory(): Partial<Record<IntentCategory, number>> {
    const rows = this.db
      .prepare('SELECT category, COUNT(*) AS count FROM interactions GROUP BY category')
      .all();

    const parsed = z.array(countRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new StorageError('Category counts do not match the expected shape', {
        cause: parsed.error,
      });
    }

    const counts: Partial<Record<IntentCategory, number>> = {};
    for (const row of parsed.data) {
      counts[row.category] = row.count;
    }
    return counts;
  }

  /** Substring search over the raw input, newest first. */
  search(query: string, limit = 10): LoggedInteraction[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM interactions WHERE input LIKE ? ESCAPE '\\' ORDER BY created_at DESC, id DESC LIMIT ?`
      )
      .all(`%${escapeLike(query)}%`, limit);

    return rows.map(toInteraction);
  }

  /** Keeps the newest `maxEntries` rows; returns how many were deleted. */
  prune(maxEntries: number): number {
    const info = this.db
      .prepare(
        `DELETE FROM interactions WHERE id NOT IN (
          SELECT id FROM interactions ORDER BY created_at DESC, id DESC LIMIT ?
        )`
      )
      .run(maxEntries);
    return info.changes;
  }
}
