import { ScreenActivityAnalyzer } from './ScreenActivityAnalyzer.js';
import type { ScreenActivity } from './ScreenActivityAnalyzer.js';
import type {
  ClassificationResult,
  IntentCategory,
  IntentClassifierPort,
  IntentContext,
} from '../intent/types.js';
import type { InteractionLogPort, InteractionRecord } from '../../ports/InteractionLogPort.js';
import { StorageError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ component: 'context-aware-intent' });

export const IDLE_PROMPT = "I noticed you're working on something. Need any help?";

export interface AnalyzeInput {
  text?: string;
  windowTitle?: string;
}

export interface ContextAnalysis {
  activity: ScreenActivity | null;
  result: ClassificationResult | null;
  /** e.g. "User is focused on coding" once the recent activity is uniform */
  focus: string | null;
  /** What the companion should say; null when there is nothing to respond to */
  prompt: string | null;
}

export interface ContextAwareIntentServiceOptions {
  analyzer?: ScreenActivityAnalyzer;
  interactionLog?: InteractionLogPort;
  /** How many recent categories are kept and passed as context */
  recentLimit?: number;
}

/**
 * Combines typed input with the foreground window. Owns the recent-category
 * list handed to the classifier as context; the classifier itself stays stateless.
 */
export class ContextAwareIntentService {
  private readonly analyzer: ScreenActivityAnalyzer;
  private readonly interactionLog: InteractionLogPort | undefined;
  private readonly recentLimit: number;
  private recentCategories: IntentCategory[] = [];

  constructor(
    private readonly classifier: IntentClassifierPort,
    options: ContextAwareIntentServiceOptions = {}
  ) {
    this.analyzer = options.analyzer ?? new ScreenActivityAnalyzer();
    this.interactionLog = options.interactionLog;
    this.recentLimit = options.recentLimit ?? 5;
    if (this.interactionLog) {
      this.recentCategories = this.interactionLog.getRecentCategories(this.recentLimit);
    }
  }

  analyze(input: AnalyzeInput): ContextAnalysis {
    const text = input.text?.trim() ? input.text : undefined;
    const windowTitle = input.windowTitle?.trim() ? input.windowTitle : undefined;

    let activity: ScreenActivity | null = null;
    if (windowTitle) {
      activity = this.analyzer.analyzeWindowTitle(windowTitle);
      this.analyzer.addActivity(activity);
    }
    const focus = this.analyzer.detectFocus();

    if (text === undefined) {
      return { activity, result: null, focus, prompt: activity ? IDLE_PROMPT : null };
    }

    const context: IntentContext = { recentCategories: [...this.recentCategories] };
    if (windowTitle) {
      context.foregroundApp = windowTitle;
    }

    const result = this.classifier.classifyWithContext(text, context);

    logger.debug(
      {
        category: result.category,
        confidence: result.confidence,
        resolution: result.resolution,
        activity: activity?.activityType,
      },
      'Classified input'
    );

    if (this.interactionLog) {
      try {
        const record: InteractionRecord = { result };
        if (windowTitle) {
          record.foregroundApp = windowTitle;
        }
        if (activity) {
          record.activityType = activity.activityType;
        }
        this.interactionLog.record(record);
      } catch (error) {
        logger.error({ error }, 'Failed to record interaction');
        throw error instanceof StorageError
          ? error
          : new StorageError('Failed to record interaction', { cause: error });
      }
    }

    // Only stored interactions count as recent
    this.remember(result.category);

    return { activity, result, focus, prompt: result.suggestedAction };
  }

  getRecentCategories(): readonly IntentCategory[] {
    return [...this.recentCategories];
  }

  private remember(category: IntentCategory): void {
    this.recentCategories.push(category);
    if (this.recentCategories.length > this.recentLimit) {
      this.recentCategories = this.recentCategories.slice(-this.recentLimit);
    }
  }
}
