import { computeNudges, DEFAULT_CONTEXT_NUDGES } from './contextNudges.js';
import type { ContextNudgeRule } from './contextNudges.js';
import { extractEntities } from './entityExtractor.js';
import type { PatternTable } from './PatternTable.js';
import { DEFAULT_SUGGESTIONS, suggestAction } from './suggestedActions.js';
import type { SuggestionTemplates } from './suggestedActions.js';
import {
  categoryPriority,
  DEFAULT_SCORING_OPTIONS,
  FALLBACK_CATEGORY,
  INTENT_CATEGORIES,
} from './types.js';
import type {
  CategoryScore,
  ClassificationResult,
  IntentCategory,
  IntentClassifierPort,
  IntentContext,
  Resolution,
  ScoringOptions,
} from './types.js';
import { ConfigError } from '../../utils/errors.js';

export interface IntentClassifierOptions {
  scoring?: Partial<ScoringOptions>;
  nudgeRules?: readonly ContextNudgeRule[];
  suggestions?: SuggestionTemplates;
}

const clamp = (value: number): number => Math.min(1, Math.max(0, value));

/** Cuts to `max` code points without splitting a surrogate pair. */
export function truncateInput(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  return Array.from(text).slice(0, max).join('');
}

/**
 * Weighted-pattern intent classifier.
 *
 * Per category the score is the sum of matching rule weights, plus a small bonus
 * for each long (phrase-level) match and a capped bonus for multiple matches,
 * clamped to [0, 1]. The best specific category wins if it clears its threshold;
 * otherwise the fallback category is returned with its own score.
 */
export class IntentClassifier implements IntentClassifierPort {
  private readonly options: Readonly<ScoringOptions>;
  private readonly nudgeRules: readonly ContextNudgeRule[];
  private readonly suggestions: SuggestionTemplates;

  constructor(
    private readonly table: PatternTable,
    options: IntentClassifierOptions = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_SCORING_OPTIONS, ...options.scoring });
    this.nudgeRules = options.nudgeRules ?? DEFAULT_CONTEXT_NUDGES;
    this.suggestions = options.suggestions ?? DEFAULT_SUGGESTIONS;
    this.validateOptions();
  }

  classify(text: string): ClassificationResult {
    return this.classifyWithContext(text);
  }

  /** Context nudges refine categories that already have textual evidence; they never originate one. */
  classifyWithContext(text: string, context?: IntentContext): ClassificationResult {
    const input = typeof text === 'string' ? text : '';
    const truncated = truncateInput(input, this.options.maxInputLength);
    const scores = this.scorePrepared(this.normalize(truncated), context);
    const { winner, resolution } = this.select(scores);

    const entities = extractEntities(truncated);
    const category = winner.category;

    return Object.freeze({
      input,
      category,
      confidence: clamp(winner.score),
      matchedRuleCount: winner.matchedRuleCount,
      resolution,
      entities,
      suggestedAction: suggestAction({ category, entities }, this.suggestions),
    });
  }

  /** Per-category breakdown in priority order. */
  score(text: string, context?: IntentContext): CategoryScore[] {
    const truncated = truncateInput(text, this.options.maxInputLength);
    return this.scorePrepared(this.normalize(truncated), context);
  }

  thresholdFor(category: IntentCategory): number {
    if (category === FALLBACK_CATEGORY) {
      return this.options.fallbackThreshold;
    }
    return this.options.categoryThresholds?.[category] ?? this.options.specificThreshold;
  }

  private normalize(text: string): string {
    return text.normalize('NFKC').toLowerCase();
  }

  private scorePrepared(text: string, context: IntentContext | undefined): CategoryScore[] {
    const {
      longMatchMinLength,
      longMatchBonus,
      multiMatchStep,
      multiMatchCap,
      contextNudgeCap,
      recentCategoryNudge,
      recentCategoryWindow,
    } = this.options;

    const nudges = context
      ? computeNudges(
          context,
          { cap: contextNudgeCap, recentCategoryNudge, recentWindow: recentCategoryWindow },
          this.nudgeRules
        )
      : undefined;

    return INTENT_CATEGORIES.map((category) => {
      let score = 0;
      let matchedRuleCount = 0;

      for (const rule of this.table.rulesFor(category)) {
        const matched = rule.matcher.match(text);
        if (matched === null) {
          continue;
        }
        score += rule.weight;
        matchedRuleCount++;
        if (matched.length > longMatchMinLength) {
          score += longMatchBonus;
        }
      }

      if (matchedRuleCount > 1) {
        score += Math.min((matchedRuleCount - 1) * multiMatchStep, multiMatchCap);
      }

      const nudge =
        nudges && matchedRuleCount > 0 ? Math.min(nudges.get(category) ?? 0, contextNudgeCap) : 0;

      return { category, score: clamp(clamp(score) + nudge), matchedRuleCount, nudge };
    });
  }

  private select(scores: readonly CategoryScore[]): { winner: CategoryScore; resolution: Resolution } {
    const ranked = scores
      .filter((entry) => entry.category !== FALLBACK_CATEGORY)
      .sort(
        (a, b) => b.score - a.score || categoryPriority(a.category) - categoryPriority(b.category)
      );

    const top = ranked[0];
    if (top && top.matchedRuleCount > 0 && top.score >= this.thresholdFor(top.category)) {
      return { winner: top, resolution: 'matched' };
    }

    const fallback = scores.find((entry) => entry.category === FALLBACK_CATEGORY) ?? {
      category: FALLBACK_CATEGORY,
      score: 0,
      matchedRuleCount: 0,
      nudge: 0,
    };
    const accepted =
      fallback.matchedRuleCount > 0 && fallback.score >= this.thresholdFor(FALLBACK_CATEGORY);
    return { winner: fallback, resolution: accepted ? 'matched' : 'fallback' };
  }

  private validateOptions(): void {
    const o = this.options;
    const unit: Array<[string, number]> = [
      ['specificThreshold', o.specificThreshold],
      ['fallbackThreshold', o.fallbackThreshold],
      ['multiMatchStep', o.multiMatchStep],
      ['multiMatchCap', o.multiMatchCap],
      ['longMatchBonus', o.longMatchBonus],
      ['contextNudgeCap', o.contextNudgeCap],
      ['recentCategoryNudge', o.recentCategoryNudge],
    ];
    for (const [name, value] of unit) {
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new ConfigError(`${name} must be within [0, 1], got ${value}`);
      }
    }
    if (!Number.isInteger(o.maxInputLength) || o.maxInputLength <= 0) {
      throw new ConfigError(`maxInputLength must be a positive integer, got ${o.maxInputLength}`);
    }
    for (const category of INTENT_CATEGORIES) {
      if (category === FALLBACK_CATEGORY) {
        continue;
      }
      const threshold = this.thresholdFor(category);
      if (!(threshold > o.fallbackThreshold && threshold <= 1)) {
        throw new ConfigError(
          `Threshold for ${category} (${threshold}) must be above the fallback threshold (${o.fallbackThreshold})`
        );
      }
    }
  }
}
