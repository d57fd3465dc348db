import { describe, it, expect } from 'vitest';
import { extractEntities } from '../../core/intent/entityExtractor.js';
import { GENERIC_SUGGESTION, suggestAction } from '../../core/intent/suggestedActions.js';
import { INTENT_CATEGORIES } from '../../core/intent/types.js';

describe('suggestAction', () => {
  const none = extractEntities('');

  it('should have a suggestion for every category', () => {
    for (const category of INTENT_CATEGORIES) {
      expect(suggestAction({ category, entities: none }).length).toBeGreaterThan(0);
    }
  });

  it('should fall back to the generic acknowledgment when a template is missing', () => {
    expect(suggestAction({ category: 'search', entities: none }, {})).toBe(GENERIC_SUGGESTION);
  });

  it('should use the plain text without the entity', () => {
    expect(suggestAction({ category: 'open-file', entities: none })).toBe('Opening the file...');
  });

  it('should interpolate the first entity of the declared kind', () => {
    const entities = extractEntities('open notes.md and todo.txt');
    expect(suggestAction({ category: 'open-file', entities })).toBe('Opening notes.md...');
  });

  it('should interpolate time entities into automation suggestions', () => {
    const entities = extractEntities('every day at 9:30');
    expect(suggestAction({ category: 'automation-request', entities })).toBe(
      'I can set up automation for that (9:30). Let me configure it.'
    );
  });

  it('should insert entities literally', () => {
    const entities = extractEntities('open https://example.io/?a=$&');
    expect(suggestAction({ category: 'open-url', entities })).toBe(
      'Opening https://example.io/?a=$& for you...'
    );
  });
});
