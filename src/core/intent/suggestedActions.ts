import type { ClassificationResult, EntityKind, IntentCategory } from './types.js';

export interface SuggestionTemplate {
  text: string;
  /** Used instead of `text` when the entity is present; `{entity}` is replaced by its first value */
  withEntity?: { kind: EntityKind; text: string };
}

export type SuggestionTemplates = Readonly<Partial<Record<IntentCategory, SuggestionTemplate>>>;

export const GENERIC_SUGGESTION = 'How can I help you?';

export const DEFAULT_SUGGESTIONS: SuggestionTemplates = {
  'help-request': { text: 'I can help you with that. What specifically do you need assistance with?' },
  'task-execution': { text: "I'll help you execute that task. Let me prepare the necessary steps." },
  'information-query': { text: 'Let me search for that information for you.' },
  'automation-request': {
    text: 'I can set up automation for that. Let me configure it.',
    withEntity: { kind: 'time', text: 'I can set up automation for that ({entity}). Let me configure it.' },
  },
  'file-operation': {
    text: "I'll help you with that file operation.",
    withEntity: { kind: 'filePath', text: "I'll help you with that file operation on {entity}." },
  },
  search: { text: "I'll search for that information right away." },
  'memory-operation': { text: "I'll remember that for you." },
  'screenshot-request': { text: 'Taking a screenshot now...' },
  'open-url': {
    text: 'Opening the URL for you...',
    withEntity: { kind: 'url', text: 'Opening {entity} for you...' },
  },
  'open-file': {
    text: 'Opening the file...',
    withEntity: { kind: 'filePath', text: 'Opening {entity}...' },
  },
  'code-assistance': { text: 'I can help with your code. Let me analyze it.' },
  'writing-assistance': { text: "I'll help you with your writing." },
  'web-search': { text: "I'll search for that online." },
  'system-command': { text: "I'll execute that system command." },
  'casual-chat': { text: "I'm here to chat! What's on your mind?" },
};

/** Never partial: a category without a template gets the generic acknowledgment. */
export function suggestAction(
  result: Pick<ClassificationResult, 'category' | 'entities'>,
  templates: SuggestionTemplates = DEFAULT_SUGGESTIONS
): string {
  const template = templates[result.category];
  if (!template) {
    return GENERIC_SUGGESTION;
  }

  if (template.withEntity) {
    const entity = result.entities[template.withEntity.kind][0];
    if (entity) {
      return template.withEntity.text.replace('{entity}', () => entity);
    }
  }

  return template.text;
}
