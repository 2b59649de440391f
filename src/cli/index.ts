/**
 * CLI entry point using Commander.js.
 */
import { Command } from 'commander';

const VERSION = '0.1.0'; // Match package.json

/**
 * Create and configure the CLI program.
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('srv-resolve')
    .description('Resolve SRV records into RFC 2782 failover order')
    .version(VERSION);

  program
    .command('resolve')
    .description('Resolve a name and print its records in failover order')
    .argument('<name>', 'domain name, or the domain when --service and --proto are given')
    .option('-t, --type <type>', 'record type (mnemonic or number)', 'SRV')
    .option('-s, --service <service>', 'service label, e.g. sip')
    .option('-p, --proto <proto>', 'protocol label, e.g. tcp')
    .option('--json', 'print the full result as JSON')
    .action(async (name: string, options: { type: string; service?: string; proto?: string; json?: boolean }) => {
      const { runResolve } = await import('./commands/resolve.js');
      process.exitCode = await runResolve(name, options);
    });

  program
    .command('check')
    .description('Verify configuration')
    .action(async () => {
      const { runCheck } = await import('./commands/check.js');
      process.exitCode = runCheck();
    });

  return program;
}

/**
 * Run the CLI program.
 * Uses parseAsync for proper async action handling.
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
