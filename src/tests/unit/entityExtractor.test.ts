import { describe, it, expect } from 'vitest';
import { extractEntities } from '../../core/intent/entityExtractor.js';
import { IntentClassifier } from '../../core/intent/IntentClassifier.js';
import { loadDefaultPatternTable, PatternTable } from '../../core/intent/PatternTable.js';
import { minimalDefinition } from '../fixtures/patternTables.js';

describe('extractEntities', () => {
  it('should return every kind, empty when nothing matches', () => {
    expect(extractEntities('')).toEqual({ url: [], filePath: [], email: [], number: [], time: [] });
  });

  it('should return frozen lists', () => {
    const entities = extractEntities('open https://example.com');
    expect(Object.isFrozen(entities)).toBe(true);
    expect(Object.isFrozen(entities.url)).toBe(true);
  });

  describe('urls', () => {
    it('should extract http urls', () => {
      expect(extractEntities('Visit https://example.com').url).toEqual(['https://example.com']);
    });

    it('should trim trailing punctuation', () => {
      expect(extractEntities('go to www.example.org, then stop').url).toEqual(['www.example.org']);
    });

    it('should stop at Chinese punctuation', () => {
      expect(extractEntities('打开https://example.com，谢谢').url).toEqual(['https://example.com']);
    });

    it('should keep a balanced closing parenthesis', () => {
      expect(
        extractEntities('open https://en.wikipedia.org/wiki/Rust_(programming_language)').url
      ).toEqual(['https://en.wikipedia.org/wiki/Rust_(programming_language)']);
    });

    it('should drop an unbalanced closing parenthesis', () => {
      expect(extractEntities('(see https://example.com/docs).').url).toEqual([
        'https://example.com/docs',
      ]);
    });

    it('should not report url paths as files', () => {
      const entities = extractEntities('download https://example.com/files/report.pdf');
      expect(entities.url).toEqual(['https://example.com/files/report.pdf']);
      expect(entities.filePath).toEqual([]);
    });
  });

  describe('file paths', () => {
    it('should extract quoted names', () => {
      expect(extractEntities("Open the file 'test.py'").filePath).toEqual(['test.py']);
    });

    it('should extract Windows and Unix paths in order', () => {
      const entities = extractEntities('copy C:\\Users\\me\\notes.txt to ~/backup/notes.txt');
      expect(entities.filePath).toEqual(['C:\\Users\\me\\notes.txt', '~/backup/notes.txt']);
    });

    it('should extract bare names with a known extension', () => {
      expect(extractEntities('open file report.docx').filePath).toEqual(['report.docx']);
    });
  });

  it('should extract emails without treating the domain as a file', () => {
    const entities = extractEntities("Send 'report.pdf' to admin@company.com at 10:00");
    expect(entities.email).toEqual(['admin@company.com']);
    expect(entities.filePath).toEqual(['report.pdf']);
    expect(entities.time).toEqual(['10:00']);
    expect(entities.number).toEqual(['10', '00']);
  });

  describe('numbers and times', () => {
    it('should extract plain numbers', () => {
      const entities = extractEntities('Set timer for 30 minutes');
      expect(entities.number).toEqual(['30']);
      expect(entities.time).toEqual([]);
    });

    it('should skip dotted runs such as versions and addresses', () => {
      expect(extractEntities('upgrade to v1.2.3 on 192.168.1.1').number).toEqual([]);
      expect(extractEntities('release 2.0.1 ships in 3 days').number).toEqual(['3']);
    });

    it('should keep decimals at the end of a sentence', () => {
      expect(extractEntities('the ratio is 2.5.').number).toEqual(['2.5']);
    });

    it('should extract clock times', () => {
      const entities = extractEntities('Schedule meeting at 14:30');
      expect(entities.time).toEqual(['14:30']);
      expect(entities.number).toEqual(['14', '30']);
    });

    it('should extract relative times', () => {
      const entities = extractEntities('remind me in 10 minutes');
      expect(entities.time).toEqual(['in 10 minutes']);
      expect(entities.number).toEqual(['10']);
    });

    it('should extract day words and meridiem times', () => {
      expect(extractEntities('at 3pm tomorrow').time).toEqual(['3pm', 'tomorrow']);
    });

    it('should extract Chinese relative times', () => {
      const entities = extractEntities('10分钟后提醒我');
      expect(entities.time).toEqual(['10分钟后']);
      expect(entities.number).toEqual(['10']);
    });
  });

  it('should not depend on the pattern table', () => {
    const text = 'open https://example.com at 9:30';
    const full = new IntentClassifier(loadDefaultPatternTable()).classify(text);
    const bare = new IntentClassifier(new PatternTable(minimalDefinition())).classify(text);
    expect(full.category).not.toBe(bare.category);
    expect(full.entities).toEqual(bare.entities);
  });
});
