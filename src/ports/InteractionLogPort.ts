import type { ClassificationResult, IntentCategory } from '../core/intent/types.js';
import type { ActivityType } from '../core/intent/contextNudges.js';

export interface InteractionRecord {
  result: ClassificationResult;
  foregroundApp?: string;
  activityType?: ActivityType;
}

export interface LoggedInteraction {
  id: number;
  input: string;
  category: IntentCategory;
  confidence: number;
  resolution: ClassificationResult['resolution'];
  matchedRuleCount: number;
  entities: ClassificationResult['entities'];
  foregroundApp?: string;
  activityType?: ActivityType;
  createdAt: Date;
}

/** Storage for classified user input; the classifier itself never writes here. */
export interface InteractionLogPort {
  record(interaction: InteractionRecord): LoggedInteraction;
  getRecentCategories(limit: number): IntentCategory[];
}
