/**
 * Classify a line of text from the command line.
 * Run with: npx tsx scripts/classify.ts "open https://example.com" [--window "Google Chrome"] [--log]
 */
import 'dotenv/config';
import { config } from '../src/config/index.js';
import { createIntentClassifier } from '../src/core/intent/createIntentClassifier.js';
import { ContextAwareIntentService } from '../src/core/activity/ContextAwareIntentService.js';
import { ScreenActivityAnalyzer } from '../src/core/activity/ScreenActivityAnalyzer.js';
import { InteractionLogRepository } from '../src/persistence/repositories/InteractionLogRepository.js';
import { closeDatabase } from '../src/persistence/database.js';
import { logger } from '../src/utils/logger.js';

function parseArgs(argv: string[]): { text: string; windowTitle?: string; log: boolean } {
  const words: string[] = [];
  let windowTitle: string | undefined;
  let log = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--window') {
      windowTitle = argv[++i];
    } else if (arg === '--log') {
      log = true;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }

  const parsed: { text: string; windowTitle?: string; log: boolean } = { text: words.join(' '), log };
  if (windowTitle !== undefined) {
    parsed.windowTitle = windowTitle;
  }
  return parsed;
}

function main(): void {
  const { text, windowTitle, log } = parseArgs(process.argv.slice(2));

  const service = new ContextAwareIntentService(createIntentClassifier(config), {
    analyzer: new ScreenActivityAnalyzer(config.activityHistoryLimit),
    ...(log ? { interactionLog: new InteractionLogRepository() } : {}),
  });

  try {
    const analysis = service.analyze({ text, ...(windowTitle ? { windowTitle } : {}) });
    console.log(JSON.stringify(analysis, null, 2));
  } finally {
    closeDatabase();
  }
}

try {
  main();
} catch (error) {
  logger.error({ error }, 'Classification failed');
  process.exitCode = 1;
}
