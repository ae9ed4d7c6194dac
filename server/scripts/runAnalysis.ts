#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../config';
import { saveDashboard } from '../services/dashboardService';
import { SettlementAnalysis } from '../services/analysisService';
import { ElexonClient } from '../services/elexon';
import { formatAnalysisResults } from '../utils/display';
import { extractErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

// Get command line arguments
const startDate = process.argv[2];
const endDate = process.argv[3];
const outputArg = process.argv[4];

if (!startDate || !endDate) {
  console.error('Usage: npm run analyse <YYYY-MM-DD start> <YYYY-MM-DD end> [output.html]');
  process.exit(1);
}

async function main() {
  const config = loadConfig();
  logger.configure({
    logDir: config.logging.dir,
    enableFile: config.logging.toFile,
    minLevel: config.logging.level
  });

  const analysis = new SettlementAnalysis(new ElexonClient(config.elexon));
  const run = await analysis.runAnalysis(startDate, endDate);

  console.log(formatAnalysisResults(run.result));

  const output = await saveDashboard(run, outputArg ?? config.dashboardOutput);
  console.log(`\nAnalysis complete. Dashboard saved to '${output}'`);
}

main()
  .then(() => logger.flush())
  .catch(async error => {
    if (error instanceof Error) {
      logger.logError(error, { module: 'cli' });
    }
    console.error(`\nError: ${extractErrorMessage(error)}`);
    // Let the log file drain before the process ends
    await logger.flush();
    process.exitCode = 1;
  });
