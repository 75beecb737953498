#!/usr/bin/env node
// ============================================
// RIDESIM - Main Entry Point
// ============================================

// Load environment variables from .env file
import 'dotenv/config';

import { env } from './config/env.js';
import { formatReport, runScenario } from './app.js';
import { logger } from './utils/logger.js';

async function main() {
  const scenarioPath = process.argv[2] ?? env.SCENARIO_PATH;
  if (!scenarioPath) {
    logger.error('Usage: ridesim <scenario-file> (or set SCENARIO_PATH)');
    process.exit(1);
  }

  const { summary, report } = await runScenario(scenarioPath);
  logger.info(summary, `Processed ${scenarioPath}`);
  console.log(JSON.stringify(formatReport(report), null, 2));
}

main().catch((err) => {
  logger.error({ err }, 'Simulation failed');
  process.exit(1);
});
