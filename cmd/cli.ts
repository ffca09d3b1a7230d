#!/usr/bin/env node

/**
 * Instagram comment crawler CLI
 */

import 'dotenv/config';
import * as readline from 'readline';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  createCommentCrawler,
  ErrorCode,
  eventBusInstance,
  installStopSignalHandlers,
  ScraperError,
} from '../core';
import type { CrawlerEventBus, CrawlProgressData, LogMessageData } from '../core';
import {
  closeLogger,
  ConfigManager,
  createEnhancedLogger,
  DEFAULT_CONFIG_FILE,
  LOG_LEVELS,
  setLogLevel,
} from '../utils';

const logger = createEnhancedLogger('CLI');

export interface CliOptions {
  postUrl: string;
  config: string;
  maxComments?: number;
  resume?: boolean;
  fetchReplies?: boolean;
  debug: boolean;
}

type RawCliOptions = {
  postUrl: string;
  config: string;
  maxComments?: number;
  resume?: boolean;
  fetchReplies?: boolean;
  replies: boolean;
  debug?: boolean;
};

function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

export function buildProgram(): Command {
  return new Command()
    .name('ig-comment-crawler')
    .description('Crawl every comment and reply of an Instagram post, with resumable checkpoints')
    .version('1.0.0')
    .requiredOption('--post-url <url>', 'Instagram post URL (/p/, /reel/ or /tv/)')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_FILE)
    .option('--max-comments <number>', 'Stop after N unique comments (0 = no limit)', parseNonNegativeInt)
    .option('--resume', 'Resume from the saved checkpoint')
    .option('--no-resume', 'Ignore any saved checkpoint')
    .addOption(new Option('--fetch-replies', 'Force reply fetching on').conflicts('replies'))
    .option('--no-replies', 'Skip reply fetching')
    .option('-d, --debug', 'Enable debug mode with verbose logs', false);
}

/**
 * Parses argv into crawl options; unset flags stay undefined so the
 * configuration decides.
 */
export function parseCliOptions(argv: readonly string[], from: 'node' | 'user' = 'node', program: Command = buildProgram()): CliOptions {
  program.parse([...argv], { from });
  const raw = program.opts<RawCliOptions>();

  let fetchReplies: boolean | undefined;
  if (raw.fetchReplies) {
    fetchReplies = true;
  } else if (raw.replies === false) {
    fetchReplies = false;
  }

  return {
    postUrl: raw.postUrl,
    config: raw.config,
    maxComments: raw.maxComments,
    resume: raw.resume,
    fetchReplies,
    debug: Boolean(raw.debug),
  };
}

// Progress Bar Helper
function monitorProgress(eventBus: CrawlerEventBus, debugMode: boolean): () => void {
  let lastProgress: CrawlProgressData | null = null;

  const updateBar = (data: CrawlProgressData): void => {
    lastProgress = data;
    const { current, target, action } = data;
    const width = 30;
    const percentage = target > 0 ? Math.min(100, Math.round((current / target) * 100)) : 0;
    const filled = Math.round((width * percentage) / 100);
    const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
    const total = target > 0 ? String(target) : '?';

    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);
    process.stdout.write(`[${bar}] ${current}/${total} (${percentage}%) | ${action}`);
  };

  const onLog = (data: LogMessageData): void => {
    if (debugMode || data.level !== 'debug') {
      readline.clearLine(process.stdout, 0);
      readline.cursorTo(process.stdout, 0);

      const time = new Date().toLocaleTimeString();
      console.log(`[${time}] [${data.level.toUpperCase()}] ${data.message}`);

      if (lastProgress) {
        updateBar(lastProgress);
      }
    }
  };

  const offProgress = eventBus.onProgress(updateBar);
  const offLog = eventBus.onLog(onLog);

  return () => {
    offProgress();
    offLog();
    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);
  };
}

/**
 * Runs one crawl; resolves to the process exit code
 */
export async function runCli(options: CliOptions): Promise<number> {
  if (options.debug) {
    setLogLevel(LOG_LEVELS.DEBUG);
  }

  let manager: ConfigManager;
  try {
    manager = new ConfigManager(options.config);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  logger.debug('Configuration loaded', { configFile: manager.getConfigFile() });

  const credentials = manager.validateCredentials();
  if (!credentials.valid) {
    console.warn(`⚠️ Missing required cookies: ${credentials.missing.join(', ')}`);
  }

  const removeSignalHandlers = installStopSignalHandlers(() => {
    console.log('\n⏸️ Stopping after the current step... (press Ctrl+C again to exit)');
  });
  const stopMonitoring = monitorProgress(eventBusInstance, options.debug);

  try {
    const crawler = createCommentCrawler(manager.getConfig(), { eventBus: eventBusInstance });
    const result = await crawler.crawlPostComments(options.postUrl, {
      maxComments: options.maxComments,
      resume: options.resume,
      fetchReplies: options.fetchReplies,
    });
    stopMonitoring();

    console.log(`Saved: ${result.output_path}`);
    console.log(`Comments: ${result.comment_count}`);
    console.log(`Stop reason: ${result.stop_reason ?? 'unknown'}`);
    return 0;
  } catch (error) {
    stopMonitoring();
    if (error instanceof ScraperError && (error.code === ErrorCode.INVALID_INPUT || error.code === ErrorCode.CONFIG_ERROR)) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    logger.error('Crawl failed', error instanceof Error ? error : undefined);
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    removeSignalHandlers();
  }
}

export async function main(argv: readonly string[] = process.argv): Promise<number> {
  return runCli(parseCliOptions(argv));
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    })
    .finally(() => closeLogger());
}
