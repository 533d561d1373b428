#!/usr/bin/env npx tsx
import { config as loadEnv } from 'dotenv';
loadEnv();

import { readFile } from 'node:fs/promises';
import { runValuation } from './src/comps-engine/engine';
import { formatReport } from './src/comps-engine/main';
import { createConsoleLogger } from './src/comps-engine/logger';

const SAMPLE = process.env.COMPS_INPUT_FILE ?? './samples/industrial-sample.json';

async function main() {
  const logger = createConsoleLogger('sample', { verbose: true });
  logger.info(`Running ${SAMPLE} with sensitivity analysis...`);

  const raw: unknown = JSON.parse(await readFile(SAMPLE, 'utf-8'));
  const result = runValuation(raw, { sensitivity: true, logger });

  for (const line of formatReport(result)) logger.line(line);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
