import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig, type Config } from '../../config.js';
import { describeError } from '../../errors.js';
import type { CrawlTargetDescriptor } from '../../types.js';
import { createOrchestrator, parseIntOption, parseSite, printOutcome, readFiltersOption } from '../shared.js';

interface RunOptions {
  site: string;
  email: string;
  url?: string;
  pages?: string;
  filters?: string;
  filtersFile?: string;
  interactive?: boolean;
  label?: string;
  config: string;
}

export const runCommand = new Command('run')
  .description('Crawl one search and e-mail its subscriber about new listings')
  .requiredOption('--site <id>', 'Site: immoweb, immokh or marjorietome')
  .requiredOption('--email <address>', 'Subscriber address')
  .option('--url <url>', 'Search URL (optional for sites with a fixed search page)')
  .option('--pages <n>', 'Page/step/cycle budget (default from config)')
  .option('--filters <json>', 'Filter set as JSON, e.g. {"price_max":300000,"cities":["namur"]}')
  .option('--filters-file <path>', 'Read the filter set from a JSON file')
  .option('--interactive', 'Drive a browser through the "load more" control')
  .option('--label <label>', 'Name shown in logs')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(async (options: RunOptions) => {
    let config: Config;
    let descriptor: CrawlTargetDescriptor;
    try {
      config = loadConfig(options.config);
      descriptor = {
        site: parseSite(options.site),
        url: options.url,
        email: options.email.trim(),
        pages: parseIntOption(options.pages, 'pages') ?? config.defaultPages,
        filters: readFiltersOption(options.filters, options.filtersFile),
        useInteractiveMode: options.interactive ?? false,
        label: options.label,
      };
    } catch (error) {
      console.error(`Invalid input: ${describeError(error)}`);
      process.exit(1);
    }

    console.log(`\n🔍 ${descriptor.site} ${descriptor.url ?? '(default search)'} → ${descriptor.email}\n`);

    const outcome = await createOrchestrator(config).runTarget(descriptor);
    printOutcome(outcome);
    console.log('');

    if (outcome.status === 'invalid') {
      process.exit(1);
    }
  });
