import { Command } from 'commander';
import { conformityCommand, type ConformityFlags } from './commands/conformity.js';
import { runCommand } from './commands/run.js';
import type { RunFlags } from './options.js';

/** Options `run` and `resume` share. */
function withRunOptions(command: Command): Command {
  return command
    .option('-m, --max <n>', 'Process at most N companies')
    .option('-y, --year <year>', 'Contract year to filter the portal by')
    .option('--headless', 'Run the browser without a window')
    .option('--no-headless', 'Show the browser window (needed to solve a CAPTCHA by hand)')
    .option('--csv <path>', 'Company list to use instead of reading the portal table')
    .option('--run-id <id>', 'Run identifier; checkpoint and outputs are keyed by it');
}

export function buildProgram(): Command {
  const program = new Command('publication-audit')
    .description('Checks that municipal contracts were published in the official gazette on time and as signed')
    .version('0.1.0');

  withRunOptions(program.command('run'))
    .description('Run the full pipeline for the filtered company set')
    .option('--resume', 'Continue from the checkpoint of the same run id')
    .action(async (options: RunFlags) => {
      process.exitCode = await runCommand(options);
    });

  withRunOptions(program.command('resume'))
    .description('Resume an interrupted run from its checkpoint')
    .action(async (options: RunFlags) => {
      process.exitCode = await runCommand({ ...options, resume: true });
    });

  program
    .command('conformity <pairs>')
    .description('Evaluate conformity for pre-extracted contract/publication pairs (JSON array)')
    .option('-o, --out <path>', 'Write results to a file instead of stdout')
    .option('--run-id <id>', 'Run identifier recorded in the output')
    .action(async (pairs: string, options: ConformityFlags) => {
      process.exitCode = await conformityCommand(pairs, options);
    });

  program.addHelpText(
    'after',
    `
Examples:
  $ publication-audit run --max 5 --no-headless
  $ publication-audit resume --run-id contracts-2025
  $ publication-audit conformity pairs.json -o results.json`,
  );

  return program;
}
