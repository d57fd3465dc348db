import { describe, it, expect } from 'vitest';
import { ScreenActivityAnalyzer } from '../../core/activity/ScreenActivityAnalyzer.js';

describe('ScreenActivityAnalyzer', () => {
  it.each([
    ['main.ts - Visual Studio Code', 'coding', 'ide'],
    ['PyCharm', 'coding', 'ide'],
    ['knowledge.ts - Visual Studio Code', 'coding', 'ide'],
    ['Google Chrome', 'web_browsing', 'browser'],
    ['Untitled document - Google Docs - Google Chrome', 'web_browsing', 'browser'],
    ['Microsoft Word', 'writing', 'text_editor'],
    ['Book1 - Excel', 'spreadsheet', 'spreadsheet_app'],
    ['Spotify', 'unknown', ''],
  ])('should classify "%s" as %s', (title, activityType, appLabel) => {
    const analyzer = new ScreenActivityAnalyzer();
    expect(analyzer.analyzeWindowTitle(title)).toEqual({ activityType, appLabel, windowTitle: title });
  });

  it('should keep a bounded history', () => {
    const analyzer = new ScreenActivityAnalyzer(3);
    for (const title of ['a', 'b', 'c', 'd', 'Google Chrome']) {
      analyzer.addActivity(analyzer.analyzeWindowTitle(title));
    }
    const history = analyzer.getHistory();
    expect(history.map((activity) => activity.windowTitle)).toEqual(['c', 'd', 'Google Chrome']);
  });

  describe('detectFocus', () => {
    it('should need at least three entries', () => {
      const analyzer = new ScreenActivityAnalyzer();
      analyzer.addActivity(analyzer.analyzeWindowTitle('PyCharm'));
      analyzer.addActivity(analyzer.analyzeWindowTitle('PyCharm'));
      expect(analyzer.detectFocus()).toBeNull();
    });

    it('should report a uniform run of activity', () => {
      const analyzer = new ScreenActivityAnalyzer();
      for (let i = 0; i < 3; i++) {
        analyzer.addActivity(analyzer.analyzeWindowTitle('PyCharm'));
      }
      expect(analyzer.detectFocus()).toBe('User is focused on coding');

      analyzer.addActivity(analyzer.analyzeWindowTitle('Google Chrome'));
      expect(analyzer.detectFocus()).toBeNull();
    });

    it('should look only at the last five entries', () => {
      const analyzer = new ScreenActivityAnalyzer();
      analyzer.addActivity(analyzer.analyzeWindowTitle('Google Chrome'));
      for (let i = 0; i < 5; i++) {
        analyzer.addActivity(analyzer.analyzeWindowTitle('Microsoft Word'));
      }
      expect(analyzer.detectFocus()).toBe('User is focused on writing');
    });
  });
});
