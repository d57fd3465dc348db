import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createMatcher } from './matchers.js';
import { INTENT_CATEGORIES, isIntentCategory } from './types.js';
import type { IntentCategory, MatchRule, MatcherFamily } from './types.js';
import { PatternTableError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_PATTERNS_PATH = join(__dirname, '../../../patterns/default.json');

const logger = createLogger({ component: 'pattern-table' });

const ruleDefinitionSchema = z.object({
  pattern: z.string().min(1),
  weight: z.number(),
});

const categoryRulesSchema = z.object({
  word: z.array(ruleDefinitionSchema).default([]),
  sequence: z.array(ruleDefinitionSchema).default([]),
});

const patternTableFileSchema = z.object({
  name: z.string().default('default'),
  locales: z.array(z.string()).default([]),
  categories: z.record(z.string(), categoryRulesSchema),
});

export type RuleDefinition = z.infer<typeof ruleDefinitionSchema>;
export type CategoryRuleDefinition = z.input<typeof categoryRulesSchema>;
export type PatternTableDefinition = z.input<typeof patternTableFileSchema>;

const FAMILIES: readonly MatcherFamily[] = ['word', 'sequence'];

function parseDefinition(value: unknown, origin: string): z.output<typeof patternTableFileSchema> {
  const parsed = patternTableFileSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PatternTableError(`Pattern table ${origin} is malformed:\n${issues.join('\n')}`, undefined, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Immutable category → rules lookup. Every category must own at least one rule;
 * any problem with the definition is raised here, never per classification.
 */
export class PatternTable {
  readonly name: string;
  readonly locales: readonly string[];
  private readonly rules: ReadonlyMap<IntentCategory, readonly MatchRule[]>;

  constructor(definition: PatternTableDefinition) {
    const { name, locales, categories } = parseDefinition(definition, 'definition');

    for (const key of Object.keys(categories)) {
      if (!isIntentCategory(key)) {
        throw new PatternTableError(`Unknown intent category "${key}"`, key);
      }
    }

    const rules = new Map<IntentCategory, readonly MatchRule[]>();
    for (const category of INTENT_CATEGORIES) {
      const entry = categories[category];
      const compiled: MatchRule[] = [];
      if (entry) {
        for (const family of FAMILIES) {
          for (const rule of entry[family]) {
            if (!(rule.weight > 0 && rule.weight <= 1)) {
              throw new PatternTableError(
                `Weight ${rule.weight} for ${category} /${rule.pattern}/ is outside (0, 1]`,
                category
              );
            }
            compiled.push(
              Object.freeze({
                category,
                weight: rule.weight,
                matcher: createMatcher(family, rule.pattern, category),
              })
            );
          }
        }
      }
      if (compiled.length === 0) {
        throw new PatternTableError(`Category ${category} has no rules`, category);
      }
      rules.set(category, Object.freeze(compiled));
    }

    this.name = name;
    this.locales = Object.freeze([...locales]);
    this.rules = rules;
  }

  static fromFile(filePath: string): PatternTable {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new PatternTableError(`Cannot read pattern table from ${filePath}`, undefined, {
        cause: error,
      });
    }

    const table = new PatternTable(parseDefinition(raw, filePath));
    logger.info({ filePath, name: table.name, rules: table.ruleCount }, 'Loaded pattern table');
    return table;
  }

  rulesFor(category: IntentCategory): readonly MatchRule[] {
    return this.rules.get(category) ?? [];
  }

  get ruleCount(): number {
    let count = 0;
    for (const list of this.rules.values()) {
      count += list.length;
    }
    return count;
  }
}

export function loadDefaultPatternTable(): PatternTable {
  return PatternTable.fromFile(DEFAULT_PATTERNS_PATH);
}
