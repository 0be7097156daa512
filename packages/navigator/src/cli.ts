#!/usr/bin/env tsx
import * as readline from 'readline';
import { loadConfig } from './config';
import { FeedLoader } from './feed-loader';
import { execute } from './interpreter';
import { logger } from './logger';
import { NavigationNode } from './navigation';
import { ConsoleReportSink } from './report';

/**
 * Interactive navigator: reads one command per line from stdin and prints
 * the report to stdout. `exit` or end of input quits.
 *
 * Usage: gtfs-navigator [--refresh] [feed path or URL]
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = loadConfig(process.env, args);

  let downloaded = false;
  const loader = new FeedLoader(config, {
    onDownloadProgress: (loaded) => {
      downloaded = true;
      process.stderr.write(`\rDownloaded ${loaded} bytes`);
    },
  });

  if (args.includes('--refresh')) {
    loader.clearCache();
  }

  const schedule = await loader.load().finally(() => {
    if (downloaded) {
      process.stderr.write('\n');
    }
  });

  const root = NavigationNode.root(schedule);
  const sink = new ConsoleReportSink();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  rl.prompt();
  for await (const line of rl) {
    const command = line.trim();
    if (command === 'exit') {
      break;
    }
    if (command !== '') {
      execute(root, command, sink);
    }
    rl.prompt();
  }
  rl.close();
}

main().catch((error) => {
  logger.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
