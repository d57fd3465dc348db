export { IntentClassifier, truncateInput } from './core/intent/IntentClassifier.js';
export type { IntentClassifierOptions } from './core/intent/IntentClassifier.js';
export { createIntentClassifier, scoringOptionsFromConfig } from './core/intent/createIntentClassifier.js';
export {
  PatternTable,
  loadDefaultPatternTable,
  DEFAULT_PATTERNS_PATH,
} from './core/intent/PatternTable.js';
export type {
  PatternTableDefinition,
  CategoryRuleDefinition,
  RuleDefinition,
} from './core/intent/PatternTable.js';
export { wordMatcher, sequenceMatcher } from './core/intent/matchers.js';
export { extractEntities } from './core/intent/entityExtractor.js';
export {
  suggestAction,
  DEFAULT_SUGGESTIONS,
  GENERIC_SUGGESTION,
} from './core/intent/suggestedActions.js';
export type { SuggestionTemplate, SuggestionTemplates } from './core/intent/suggestedActions.js';
export {
  DEFAULT_CONTEXT_NUDGES,
  ACTIVITY_TYPES,
  computeNudges,
  findNudgeRule,
} from './core/intent/contextNudges.js';
export type { ActivityType, ContextNudgeRule } from './core/intent/contextNudges.js';
export {
  INTENT_CATEGORIES,
  FALLBACK_CATEGORY,
  ENTITY_KINDS,
  DEFAULT_SCORING_OPTIONS,
  categoryPriority,
  isIntentCategory,
} from './core/intent/types.js';
export type {
  IntentCategory,
  SpecificCategory,
  MatcherFamily,
  Matcher,
  MatchRule,
  EntityKind,
  EntityMap,
  IntentContext,
  Resolution,
  ClassificationResult,
  CategoryScore,
  ScoringOptions,
  IntentClassifierPort,
} from './core/intent/types.js';
export { ScreenActivityAnalyzer } from './core/activity/ScreenActivityAnalyzer.js';
export type { ScreenActivity } from './core/activity/ScreenActivityAnalyzer.js';
export {
  ContextAwareIntentService,
  IDLE_PROMPT,
} from './core/activity/ContextAwareIntentService.js';
export type {
  AnalyzeInput,
  ContextAnalysis,
  ContextAwareIntentServiceOptions,
} from './core/activity/ContextAwareIntentService.js';
export { InteractionLogRepository } from './persistence/repositories/InteractionLogRepository.js';
export {
  getDatabase,
  openDatabase,
  closeDatabase,
  runMigrations,
  DEFAULT_DATABASE_PATH,
} from './persistence/database.js';
export type {
  InteractionLogPort,
  InteractionRecord,
  LoggedInteraction,
} from './ports/InteractionLogPort.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { CompanionError, PatternTableError, ConfigError, StorageError } from './utils/errors.js';
export { createLogger } from './utils/logger.js';
