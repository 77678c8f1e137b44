import { Command } from 'commander';
import { readAlertJournal } from '../../alerts/journal.js';
import { DEFAULT_CONFIG_PATH, loadConfig, type Config } from '../../config.js';
import { describeError } from '../../errors.js';
import type { CrawlTargetDescriptor } from '../../types.js';
import { createOrchestrator, parseIntOption, printOutcome } from '../shared.js';

interface BatchCommandOptions {
  alerts?: string;
  defaultPages?: string;
  stopOnError?: boolean;
  config: string;
}

export const batchCommand = new Command('batch')
  .description('Replay the alert journal and run every alert in force, one after another')
  .option('--alerts <path>', 'JSONL alert journal (default from config)')
  .option('--default-pages <n>', 'Budget for alerts that do not set one')
  .option('--stop-on-error', 'Stop at the first failed or invalid alert')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(async (options: BatchCommandOptions) => {
    let config: Config;
    let alerts: CrawlTargetDescriptor[];
    try {
      config = loadConfig(options.config);
      const defaultPages = parseIntOption(options.defaultPages, 'default-pages') ?? config.defaultPages;
      alerts = readAlertJournal(options.alerts ?? config.alertsPath, defaultPages);
    } catch (error) {
      console.error(`Invalid input: ${describeError(error)}`);
      process.exit(1);
    }

    if (alerts.length === 0) {
      console.log('No alerts in force.');
      return;
    }

    console.log(`\n🚀 Running ${alerts.length} alert(s)\n`);
    const summary = await createOrchestrator(config).runBatch(alerts, { stopOnError: options.stopOnError ?? false });

    for (const outcome of summary.outcomes) {
      printOutcome(outcome);
    }

    console.log('\n📊 Summary');
    for (const [status, count] of Object.entries(summary.counts)) {
      if (count > 0) console.log(`  ${status.padEnd(10)} ${count}`);
    }
    if (summary.stopped) {
      console.log(`  stopped after ${summary.outcomes.length} of ${alerts.length}`);
    }
    console.log('');
  });
