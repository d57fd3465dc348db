/**
 * Pulls URLs, file paths, emails, numbers and time expressions out of free text.
 * Handles: "open https://example.com", "edit 'notes.md'", "remind me in 10 minutes",
 * "C:\Users\me\report.docx", "10分钟后", etc.
 */
import type { EntityMap } from './types.js';

interface Span {
  start: number;
  end: number;
  value: string;
}

const FILE_EXTENSIONS =
  'py|txt|md|docx?|pdf|jpe?g|png|gif|svg|xlsx?|csv|json|ya?ml|xml|cpp|c|h|java|js|ts|tsx|html|css|pptx?|zip|log|sh|exe';

const URL_PATTERNS = [
  /https?:\/\/[^\s，。！？、；：“”‘’（）《》<>"]+/gi,
  /\bwww\.[^\s，。！？、；：“”‘’（）《》<>"]+/gi,
];
const TRAILING_URL_PUNCTUATION = /[.,;:!?'"]$/;
const BRACKET_PAIRS: Readonly<Record<string, string>> = { ')': '(', ']': '[', '}': '{' };

const EMAIL_PATTERNS = [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g];

const FILE_PATH_PATTERNS = [
  // Quoted name with an extension; the capture group is the path
  /["']([^"'\n]+\.[A-Za-z0-9]+)["']/g,
  // Windows
  /\b[A-Za-z]:\\(?:[^\\\s"'<>|:*?]+\\)*[^\\\s"'<>|:*?]*/g,
  // Unix, absolute or relative to ~ / . / ..
  /(?<![\w/~.])(?:~|\.{1,2})?\/(?:[\w.-]+\/)*[\w.-]+/g,
  // Bare name with a known extension
  new RegExp(`(?<![\\w/\\\\.-])[\\w-][\\w.-]*\\.(?:${FILE_EXTENSIONS})\\b(?![\\w/\\\\-])`, 'gi'),
];

// Dotted runs such as versions and IP addresses are not numbers
const NUMBER_PATTERNS = [/(?<![\d.])\b\d+(?:\.\d+)?\b(?![.]?\d)/g];

const TIME_PATTERNS = [
  // 14:30, 9:05 pm
  /\b(?:[01]?\d|2[0-3]):[0-5]\d(?:\s?[ap]\.?m\.?)?(?![\w:])/gi,
  // 3pm, 11 am
  /\b(?:1[0-2]|0?[1-9])\s?[ap]m\b/gi,
  // in 10 minutes, in an hour
  /\bin\s+(?:\d+|an?|a few)\s+(?:seconds?|secs?|minutes?|mins?|hours?|hrs?|days?|weeks?|months?)\b/gi,
  // 2 hours later, 5 minutes ago, a day from now
  /\b(?:\d+|an?)\s+(?:seconds?|minutes?|mins?|hours?|days?|weeks?|months?)\s+(?:ago|later|from now)\b/gi,
  /\b(?:today|tonight|tomorrow|yesterday|this (?:morning|afternoon|evening)|next (?:week|month))\b/gi,
  // 10分钟后, 3天前
  /\d+\s*(?:秒|分钟|小时|个小时|天|周|个月)(?:后|以后|之后|前|以前)/gu,
  // 3点, 3点半, 15点30分
  /\d{1,2}\s*点(?:\s*\d{1,2}\s*分|半|钟)?/gu,
  /(?:今天|明天|后天|昨天|今晚|明早|下周|下个月)/gu,
];

function collectSpans(text: string, patterns: readonly RegExp[], useGroup = false): Span[] {
  const spans: Span[] = [];
  for (const pattern of patterns) {
    for (const m of text.matchAll(pattern)) {
      const full = m[0];
      const group = useGroup ? m[1] : undefined;
      const value = group ?? full;
      if (!value) {
        continue;
      }
      const offset = group !== undefined ? full.indexOf(group) : 0;
      const start = (m.index ?? 0) + offset;
      spans.push({ start, end: start + value.length, value });
    }
  }
  return spans;
}

/** Earlier start wins; for equal starts the longer span wins. Output is in input order. */
function resolveOverlaps(spans: Span[]): Span[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start || b.end - a.end);
  const kept: Span[] = [];
  let cursor = -1;
  for (const span of sorted) {
    if (span.start >= cursor) {
      kept.push(span);
      cursor = span.end;
    }
  }
  return kept;
}

function mask(text: string, spans: readonly Span[]): string {
  let masked = text;
  for (const span of spans) {
    masked = masked.slice(0, span.start) + ' '.repeat(span.end - span.start) + masked.slice(span.end);
  }
  return masked;
}

const count = (text: string, ch: string): number => text.split(ch).length - 1;

/** Strips trailing punctuation; a closing bracket goes only when it is unbalanced. */
function trimUrl(url: string): string {
  let value = url;
  for (;;) {
    const last = value.at(-1);
    if (last === undefined) {
      return value;
    }
    const opener = BRACKET_PAIRS[last];
    const strip = opener
      ? count(value, last) > count(value, opener)
      : TRAILING_URL_PUNCTUATION.test(last);
    if (!strip) {
      return value;
    }
    value = value.slice(0, -1);
  }
}

function extractUrlSpans(text: string): Span[] {
  return resolveOverlaps(
    collectSpans(text, URL_PATTERNS).map((span) => {
      const value = trimUrl(span.value);
      return { start: span.start, end: span.start + value.length, value };
    })
  );
}

function extractFilePathSpans(text: string, exclude: readonly Span[]): Span[] {
  const visible = mask(text, exclude);
  // The quoted pattern reports its capture group
  const [quoted, ...rest] = FILE_PATH_PATTERNS;
  const spans = [
    ...(quoted ? collectSpans(visible, [quoted], true) : []),
    ...collectSpans(visible, rest),
  ].filter((span) => span.value.trim().length > 0);
  return resolveOverlaps(spans);
}

const values = (spans: readonly Span[]): readonly string[] =>
  Object.freeze(spans.map((span) => span.value));

/** Every kind is always present; a kind with no match maps to an empty list. */
export function extractEntities(text: string): EntityMap {
  const urls = extractUrlSpans(text);
  const emails = resolveOverlaps(collectSpans(text, EMAIL_PATTERNS));

  return Object.freeze({
    url: values(urls),
    filePath: values(extractFilePathSpans(text, [...urls, ...emails])),
    email: values(emails),
    number: values(resolveOverlaps(collectSpans(text, NUMBER_PATTERNS))),
    time: values(resolveOverlaps(collectSpans(text, TIME_PATTERNS))),
  });
}
