import { Command } from 'commander';
import { describeError } from '../../errors.js';
import { sendTestEmail } from '../../notify/email.js';

export const testEmailCommand = new Command('test-email')
  .description('Send a test message through the configured SMTP server')
  .requiredOption('--email <address>', 'Recipient')
  .action(async (options: { email: string }) => {
    try {
      await sendTestEmail(options.email.trim());
      console.log(`✅ Test e-mail sent to ${options.email}`);
    } catch (error) {
      console.error(`Test e-mail failed: ${describeError(error)}`);
      process.exit(1);
    }
  });
