import { DEFAULT_CONTEXT_NUDGES, findNudgeRule } from '../intent/contextNudges.js';
import type { ActivityType, ContextNudgeRule } from '../intent/contextNudges.js';

export interface ScreenActivity {
  activityType: ActivityType;
  appLabel: string;
  windowTitle: string;
}

/**
 * Maps foreground window titles to coarse activity types, using the same
 * keyword table that drives the classifier's context nudges.
 */
export class ScreenActivityAnalyzer {
  private history: ScreenActivity[] = [];

  constructor(
    private readonly historyLimit = 50,
    private readonly rules: readonly ContextNudgeRule[] = DEFAULT_CONTEXT_NUDGES
  ) {}

  analyzeWindowTitle(windowTitle: string): ScreenActivity {
    const rule = findNudgeRule(windowTitle, this.rules);
    return {
      activityType: rule?.activity ?? 'unknown',
      appLabel: rule?.appLabel ?? '',
      windowTitle,
    };
  }

  addActivity(activity: ScreenActivity): void {
    this.history.push(activity);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }
  }

  getHistory(): readonly ScreenActivity[] {
    return [...this.history];
  }

  /** Needs at least 3 entries; reports focus when the last 5 share one activity type. */
  detectFocus(): string | null {
    if (this.history.length < 3) {
      return null;
    }

    const types = new Set(this.history.slice(-5).map((activity) => activity.activityType));
    if (types.size === 1) {
      const [only] = types;
      return `User is focused on ${only}`;
    }

    return null;
  }
}
