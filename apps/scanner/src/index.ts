// Only load dotenv in development - production runs supply real env vars
if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { CommanderError } from 'commander';
import { createLogger } from '@scan-harvest/shared';
import { loadConfig, type ScannerConfig } from './config.js';
import { createConsolePrompt } from './prompt.js';
import { formatSummary, runScanner } from './run.js';

const logger = createLogger({ service: 'scanner' });

async function main(argv: string[]): Promise<void> {
  let config: ScannerConfig;
  try {
    config = loadConfig(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help, --version and unknown flags; commander already printed
      process.exitCode = error.exitCode;
      return;
    }
    logger.fatal('Invalid configuration', error);
    process.exitCode = 1;
    return;
  }

  const outcome = await runScanner(config, { logger, prompt: createConsolePrompt() });

  for (const line of formatSummary(outcome)) {
    console.log(line);
  }
  process.exitCode = outcome.ok ? 0 : 1;
}

await main(process.argv.slice(2));
