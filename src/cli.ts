import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { createScanDeps, runScan } from './services/scan-runner';
import { getLatestCsv } from './services/csv-exporter';
import { startScheduler } from './scheduler/cron';
import { logger, setLogLevel } from './utils/logger';

const [command = 'schedule'] = process.argv.slice(2);

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  switch (command) {
    case 'run': {
      const result = await runScan(createScanDeps(config), 'Manual');
      console.log('\nResult:', JSON.stringify(result, null, 2));
      break;
    }

    case 'schedule': {
      const deps = createScanDeps(config);
      const task = startScheduler(config, () => runScan(deps, 'Scheduled'));

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, stopping scheduler`);
        task.stop();
        process.exit(0);
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));
      break;
    }

    case 'latest': {
      const latest = await getLatestCsv(config.outputDir);
      console.log(latest ?? `No CSV files in ${config.outputDir}`);
      break;
    }

    default:
      console.log(`
Usage:
  node dist/cli.js schedule   Run scans on SCAN_SCHEDULE (default)
  node dist/cli.js run        Run one scan now
  node dist/cli.js latest     Print the most recent CSV path
      `);
  }
}

main().catch(err => {
  logger.error('Command failed', err, { command });
  process.exit(1);
});
