import { describe, it, expect } from 'vitest';
import { computeNudges, findNudgeRule } from '../../core/intent/contextNudges.js';
import type { ContextNudgeRule } from '../../core/intent/contextNudges.js';
import { IntentClassifier } from '../../core/intent/IntentClassifier.js';
import { loadDefaultPatternTable, PatternTable } from '../../core/intent/PatternTable.js';
import { minimalDefinition } from '../fixtures/patternTables.js';

const settings = { cap: 0.15, recentCategoryNudge: 0.05, recentWindow: 3 };

describe('computeNudges', () => {
  it('should return the first matching app rule', () => {
    expect(findNudgeRule('Google Chrome - Inbox')?.appLabel).toBe('browser');
    expect(findNudgeRule('main.ts - Visual Studio Code')?.appLabel).toBe('ide');
    expect(findNudgeRule('Spotify')).toBeUndefined();
    expect(findNudgeRule('谷歌浏览器')?.appLabel).toBe('browser');
    expect(findNudgeRule(undefined)).toBeUndefined();
  });

  it('should match keywords as whole words', () => {
    expect(findNudgeRule('knowledge.ts - Visual Studio Code')?.appLabel).toBe('ide');
    expect(findNudgeRule('Microsoft Edge')?.appLabel).toBe('browser');
    expect(findNudgeRule('Cadence Notes')).toBeUndefined();
  });

  it('should never nudge the fallback category', () => {
    const nudges = computeNudges({ recentCategories: ['casual-chat', 'search'] }, settings);
    expect(nudges.has('casual-chat')).toBe(false);
    expect(nudges.get('search')).toBeCloseTo(0.05);
  });

  it('should only count the most recent categories', () => {
    const nudges = computeNudges(
      { recentCategories: ['search', 'help-request', 'help-request', 'help-request'] },
      settings
    );
    expect(nudges.has('search')).toBe(false);
    expect(nudges.get('help-request')).toBeCloseTo(0.05);
  });

  it('should ignore recent categories when the window is zero', () => {
    const nudges = computeNudges({ recentCategories: ['search'] }, { ...settings, recentWindow: 0 });
    expect(nudges.size).toBe(0);
  });
});

describe('IntentClassifier.classifyWithContext', () => {
  const classifier = new IntentClassifier(loadDefaultPatternTable());

  it('should not originate a category from context alone', () => {
    const plain = classifier.classify('hello');
    const nudged = classifier.classifyWithContext('hello', { foregroundApp: 'Visual Studio Code' });
    expect(nudged.category).toBe('casual-chat');
    expect(nudged.confidence).toBe(plain.confidence);
  });

  it('should let the foreground app settle a tie', () => {
    expect(classifier.classify('look up the function').category).toBe('code-assistance');

    const result = classifier.classifyWithContext('look up the function', {
      foregroundApp: 'Google Chrome',
    });
    expect(result.category).toBe('web-search');
    expect(result.confidence).toBeCloseTo(0.7);
  });

  it('should be equivalent to classify without context', () => {
    expect(classifier.classifyWithContext('screenshot please')).toEqual(
      classifier.classify('screenshot please')
    );
  });

  it('should cap the combined nudge', () => {
    const rules: ContextNudgeRule[] = [
      { activity: 'coding', appLabel: 'ide', appKeywords: ['my ide'], nudges: { search: 0.5 } },
    ];
    const table = new PatternTable(
      minimalDefinition({ search: { word: [{ pattern: '\\bfind\\b', weight: 0.3 }] } })
    );
    const nudged = new IntentClassifier(table, { nudgeRules: rules });

    expect(nudged.classify('find').category).toBe('casual-chat');

    const [search] = nudged
      .score('find', { foregroundApp: 'My IDE' })
      .filter((entry) => entry.category === 'search');
    expect(search?.nudge).toBeCloseTo(0.15);
    expect(search?.score).toBeCloseTo(0.45);

    const result = nudged.classifyWithContext('find', { foregroundApp: 'My IDE' });
    expect(result.category).toBe('search');
  });

  it('should favor recently seen categories', () => {
    const table = new PatternTable(
      minimalDefinition({ search: { word: [{ pattern: '\\bfind\\b', weight: 0.36 }] } })
    );
    const recent = new IntentClassifier(table);

    expect(recent.classify('find').category).toBe('casual-chat');
    expect(recent.classifyWithContext('find', { recentCategories: ['search'] }).category).toBe(
      'search'
    );
    expect(
      recent.classifyWithContext('find', {
        recentCategories: ['search', 'help-request', 'help-request', 'help-request'],
      }).category
    ).toBe('casual-chat');
  });
});
