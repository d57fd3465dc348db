import { config as defaultConfig } from '../../config/index.js';
import type { Config } from '../../config/index.js';
import { IntentClassifier } from './IntentClassifier.js';
import type { IntentClassifierOptions } from './IntentClassifier.js';
import { loadDefaultPatternTable, PatternTable } from './PatternTable.js';
import type { ScoringOptions } from './types.js';

export function scoringOptionsFromConfig(config: Config): ScoringOptions {
  return {
    specificThreshold: config.specificThreshold,
    fallbackThreshold: config.fallbackThreshold,
    multiMatchStep: config.multiMatchStep,
    multiMatchCap: config.multiMatchCap,
    longMatchMinLength: config.longMatchMinLength,
    longMatchBonus: config.longMatchBonus,
    maxInputLength: config.maxInputLength,
    contextNudgeCap: config.contextNudgeCap,
    recentCategoryNudge: config.recentCategoryNudge,
    recentCategoryWindow: config.recentCategoryWindow,
  };
}

/** Builds a classifier from environment config; pattern table errors surface here. */
export function createIntentClassifier(
  config: Config = defaultConfig,
  options: Omit<IntentClassifierOptions, 'scoring'> = {}
): IntentClassifier {
  const table = config.patternsPath
    ? PatternTable.fromFile(config.patternsPath)
    : loadDefaultPatternTable();
  return new IntentClassifier(table, { ...options, scoring: scoringOptionsFromConfig(config) });
}
