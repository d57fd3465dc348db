/**
 * Intent categories in tie-break priority order: when two specific categories
 * end with the same score, the one listed first wins. The fallback is last.
 */
export const INTENT_CATEGORIES = [
  'screenshot-request',
  'open-url',
  'open-file',
  'memory-operation',
  'automation-request',
  'code-assistance',
  'system-command',
  'search',
  'web-search',
  'file-operation',
  'writing-assistance',
  'task-execution',
  'help-request',
  'information-query',
  'casual-chat',
] as const;

export type IntentCategory = (typeof INTENT_CATEGORIES)[number];

export const FALLBACK_CATEGORY = 'casual-chat' satisfies IntentCategory;

export type SpecificCategory = Exclude<IntentCategory, typeof FALLBACK_CATEGORY>;

export function isIntentCategory(value: string): value is IntentCategory {
  return INTENT_CATEGORIES.some((category) => category === value);
}

export function categoryPriority(category: IntentCategory): number {
  return INTENT_CATEGORIES.indexOf(category);
}

/**
 * `word` matchers are for whitespace-delimited scripts and may rely on `\b`.
 * `sequence` matchers are for logographic text and match contiguous characters only.
 */
export type MatcherFamily = 'word' | 'sequence';

export interface Matcher {
  readonly family: MatcherFamily;
  readonly source: string;
  /** Returns the matched substring, or null. */
  match(text: string): string | null;
}

export interface MatchRule {
  readonly category: IntentCategory;
  readonly weight: number;
  readonly matcher: Matcher;
}

export const ENTITY_KINDS = ['url', 'filePath', 'email', 'number', 'time'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export type EntityMap = Readonly<Record<EntityKind, readonly string[]>>;

export interface IntentContext {
  /** Foreground application name or window title */
  foregroundApp?: string;
  /** Most recent last */
  recentCategories?: readonly IntentCategory[];
}

/** `fallback` means no category cleared its threshold and the default was returned. */
export type Resolution = 'matched' | 'fallback';

export interface ClassificationResult {
  readonly input: string;
  readonly category: IntentCategory;
  readonly confidence: number;
  readonly matchedRuleCount: number;
  readonly resolution: Resolution;
  readonly entities: EntityMap;
  readonly suggestedAction: string;
}

export interface CategoryScore {
  category: IntentCategory;
  score: number;
  matchedRuleCount: number;
  /** Context nudge applied on top of the textual score */
  nudge: number;
}

export interface ScoringOptions {
  specificThreshold: number;
  fallbackThreshold: number;
  /** Per-category overrides of `specificThreshold` */
  categoryThresholds?: Partial<Record<SpecificCategory, number>>;
  multiMatchStep: number;
  multiMatchCap: number;
  longMatchMinLength: number;
  longMatchBonus: number;
  /** Input is truncated to this many code points before matching */
  maxInputLength: number;
  contextNudgeCap: number;
  recentCategoryNudge: number;
  /** How many of the most recent categories earn the continuity nudge */
  recentCategoryWindow: number;
}

export const DEFAULT_SCORING_OPTIONS: Readonly<ScoringOptions> = Object.freeze({
  specificThreshold: 0.4,
  fallbackThreshold: 0.3,
  multiMatchStep: 0.1,
  multiMatchCap: 0.3,
  longMatchMinLength: 10,
  longMatchBonus: 0.05,
  maxInputLength: 2000,
  contextNudgeCap: 0.15,
  recentCategoryNudge: 0.05,
  recentCategoryWindow: 3,
});

/** Synchronous and pure: no I/O, no state carried between calls. */
export interface IntentClassifierPort {
  classify(text: string): ClassificationResult;
  classifyWithContext(text: string, context?: IntentContext): ClassificationResult;
}
