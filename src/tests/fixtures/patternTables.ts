import { INTENT_CATEGORIES } from '../../core/intent/types.js';
import type { IntentCategory } from '../../core/intent/types.js';
import type {
  CategoryRuleDefinition,
  PatternTableDefinition,
} from '../../core/intent/PatternTable.js';

/** Every category gets a rule that never fires unless overridden. */
export function minimalDefinition(
  overrides: Partial<Record<IntentCategory, CategoryRuleDefinition>> = {}
): PatternTableDefinition {
  const categories: Record<string, CategoryRuleDefinition> = {};
  for (const category of INTENT_CATEGORIES) {
    categories[category] = overrides[category] ?? {
      word: [{ pattern: '\\bzzqzz\\b', weight: 0.5 }],
    };
  }
  return { name: 'test', categories };
}
