#!/usr/bin/env node
/** pagefleet CLI */
import type { Page } from 'playwright';
import { createConfig } from './config.js';
import { scriptExtractor } from './executors/extractors.js';
import { createLogger } from './logger.js';
import { FetchOrchestrator } from './services/FetchOrchestrator.js';
import { loadItems } from './services/items.js';
import type { EngineConfig } from './types.js';

const USAGE = `Usage: pagefleet <items-file> [--mode http|browser] [--concurrency N] [--retries N] [--script extract.js] [--no-save]
  items-file: one URL per line, or a JSON array of URLs / request descriptors`;

const VALUE_FLAGS = ['--mode', '--concurrency', '--retries', '--script'];

async function main() {
  const args = process.argv.slice(2);
  const flagValue = (name: string) => args.find((_, i) => args[i - 1] === name);
  const itemsFile = args.find((arg, i) => !arg.startsWith('--') && !VALUE_FLAGS.includes(args[i - 1] ?? ''));

  if (!itemsFile) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const mode = flagValue('--mode') ?? 'http';
  if (mode !== 'http' && mode !== 'browser') {
    console.error(`Unknown mode "${mode}"\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  const overrides: Partial<EngineConfig> = {};
  const retries = flagValue('--retries');
  if (retries) overrides.maxRetries = parseInt(retries, 10);
  const concurrency = flagValue('--concurrency');
  if (concurrency) overrides.maxConcurrency = parseInt(concurrency, 10);

  const config = createConfig(overrides);
  const logger = createLogger({ level: config.logLevel });
  const script = flagValue('--script');

  try {
    const orchestrator = new FetchOrchestrator(config, {
      logger,
      ...(script && { extract: scriptExtractor<Page>(script) }),
    });
    const { report } = await orchestrator.run({
      items: await loadItems(itemsFile),
      mode,
      save: !args.includes('--no-save'),
    });
    // Compact JSON on the last line for scripts that consume the report
    console.log(JSON.stringify(report));
  } catch (error) {
    logger.fatal({ err: error }, 'Run failed');
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
