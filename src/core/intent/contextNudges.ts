import { FALLBACK_CATEGORY, INTENT_CATEGORIES } from './types.js';
import type { IntentCategory, IntentContext, SpecificCategory } from './types.js';

export const ACTIVITY_TYPES = ['web_browsing', 'coding', 'writing', 'spreadsheet', 'unknown'] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export interface ContextNudgeRule {
  activity: Exclude<ActivityType, 'unknown'>;
  appLabel: string;
  /** Lower-case words or phrases of the foreground app name / window title */
  appKeywords: readonly string[];
  nudges: Readonly<Partial<Record<SpecificCategory, number>>>;
}

/** Checked in order; the first rule with a matching keyword applies. */
export const DEFAULT_CONTEXT_NUDGES: readonly ContextNudgeRule[] = [
  {
    activity: 'web_browsing',
    appLabel: 'browser',
    appKeywords: ['chrome', 'firefox', 'safari', 'edge', 'opera', 'brave', '浏览器'],
    nudges: { 'web-search': 0.1, search: 0.1, 'open-url': 0.05 },
  },
  {
    activity: 'coding',
    appLabel: 'ide',
    appKeywords: ['code', 'visual studio', 'pycharm', 'intellij', 'webstorm', 'vim', 'terminal'],
    nudges: { 'code-assistance': 0.15, 'open-file': 0.05, 'file-operation': 0.05 },
  },
  {
    activity: 'writing',
    appLabel: 'text_editor',
    appKeywords: ['word', 'docs', 'notepad', 'pages', 'typora', '记事本'],
    nudges: { 'writing-assistance': 0.15 },
  },
  {
    activity: 'spreadsheet',
    appLabel: 'spreadsheet_app',
    appKeywords: ['excel', 'sheets', 'calc', 'numbers', '表格'],
    nudges: { 'automation-request': 0.1, 'file-operation': 0.05 },
  },
];

const ALPHANUMERIC = /[a-z0-9]/;

const isAlphanumeric = (ch: string | undefined): boolean => ch !== undefined && ALPHANUMERIC.test(ch);

/** Keyword occurrence not embedded in a longer Latin word ("edge" is not in "knowledge"). */
function containsKeyword(app: string, keyword: string): boolean {
  for (let at = app.indexOf(keyword); at !== -1; at = app.indexOf(keyword, at + 1)) {
    if (!isAlphanumeric(app[at - 1]) && !isAlphanumeric(app[at + keyword.length])) {
      return true;
    }
  }
  return false;
}

export function findNudgeRule(
  foregroundApp: string | undefined,
  rules: readonly ContextNudgeRule[] = DEFAULT_CONTEXT_NUDGES
): ContextNudgeRule | undefined {
  if (!foregroundApp) {
    return undefined;
  }
  const app = foregroundApp.toLowerCase();
  return rules.find((rule) => rule.appKeywords.some((keyword) => containsKeyword(app, keyword)));
}

export interface NudgeSettings {
  cap: number;
  recentCategoryNudge: number;
  /** How many trailing recent categories count */
  recentWindow: number;
}

/**
 * Raw (uncapped) nudge per category. The caller applies the cap and only
 * to categories that already have textual evidence.
 */
export function computeNudges(
  context: IntentContext,
  settings: NudgeSettings,
  rules: readonly ContextNudgeRule[] = DEFAULT_CONTEXT_NUDGES
): Map<IntentCategory, number> {
  const nudges = new Map<IntentCategory, number>();
  const add = (category: IntentCategory, amount: number): void => {
    if (category === FALLBACK_CATEGORY || amount <= 0) {
      return;
    }
    nudges.set(category, (nudges.get(category) ?? 0) + amount);
  };

  const rule = findNudgeRule(context.foregroundApp, rules);
  if (rule) {
    for (const category of INTENT_CATEGORIES) {
      if (category === FALLBACK_CATEGORY) {
        continue;
      }
      add(category, rule.nudges[category] ?? 0);
    }
  }

  const recent = context.recentCategories ?? [];
  const latest = new Set(settings.recentWindow > 0 ? recent.slice(-settings.recentWindow) : []);
  for (const category of latest) {
    add(category, settings.recentCategoryNudge);
  }

  return nudges;
}
