import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../config.js';
import { describeError } from '../../errors.js';
import { AlertStateStore, stateFilePath } from '../../state/alert-store.js';
import { SITE_IDS, type SiteId } from '../../types.js';
import { parseSite } from '../shared.js';

interface StateOptions {
  site?: string;
  config: string;
}

interface ForgetOptions {
  site?: string;
  config: string;
}

export const stateCommand = new Command('state')
  .description('Show recorded alerts: subscriber, known listings, last run')
  .option('--site <id>', 'Only this site')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(async (options: StateOptions) => {
    try {
      const config = loadConfig(options.config);
      const sites: readonly SiteId[] = options.site ? [parseSite(options.site)] : SITE_IDS;

      for (const siteId of sites) {
        const filePath = stateFilePath(config.stateDir, siteId);
        const entries = new AlertStateStore({ filePath }).list();

        console.log(`\n📁 ${siteId} (${filePath})`);
        if (entries.length === 0) {
          console.log('  no alerts recorded');
          continue;
        }
        for (const [key, record] of entries) {
          console.log(`  ${key}`);
          console.log(`    email:    ${record.email}`);
          console.log(`    seen:     ${record.seen_codes.length}`);
          console.log(`    created:  ${record.created_at_utc}`);
          console.log(`    last run: ${record.last_run_utc}`);
        }
      }
      console.log('');
    } catch (error) {
      console.error(`Invalid input: ${describeError(error)}`);
      process.exit(1);
    }
  });

export const forgetCommand = new Command('forget')
  .description('Drop an alert\'s state; its next run seeds again')
  .argument('<identityKey>', 'Key as printed by `state`')
  .option('--site <id>', 'Site (defaults to the key prefix)')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(async (identityKey: string, options: ForgetOptions) => {
    try {
      const config = loadConfig(options.config);
      const siteId = parseSite(options.site ?? identityKey.split(':')[0]);
      const store = new AlertStateStore({ filePath: stateFilePath(config.stateDir, siteId) });

      if (store.forget(identityKey)) {
        console.log(`🗑️  Forgot ${identityKey}`);
      } else {
        console.log(`No alert ${identityKey} in ${siteId} state`);
      }
    } catch (error) {
      console.error(`Invalid input: ${describeError(error)}`);
      process.exit(1);
    }
  });
