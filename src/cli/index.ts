#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { REPORT_KINDS, type ReportKind } from '../lib/usage/aggregate.js';
import { reportCommand } from './commands/report.js';
import { watchCommand } from './commands/watch.js';
import { parseBackendOption, parseDateOption, parseIntervalOption } from './context.js';

function addCommonOptions(command: Command): Command {
  return command
    .option('--from <date>', 'First day to include (YYYY-MM-DD, UTC)', parseDateOption)
    .option('--to <date>', 'Last day to include (YYYY-MM-DD, UTC)', parseDateOption)
    .option('--project <name>', 'Only projects whose name contains this text')
    .option('--tool <name>', 'Only records from this tool (claude, codex, pi, amp, opencode, gemini, droid, kimi, openclaw)')
    .option('--backend <backend>', 'Cache backend (json, sqlite)', parseBackendOption)
    .option('--pricing <file>', 'LiteLLM-format pricing table to use')
    .option('--json', 'Output as JSON')
    .option('--breakdown', 'Show per-model rows under each period')
    .option('-q, --quiet', 'No progress spinner')
    .option('-v, --verbose', 'Debug logging on stderr');
}

function parseReportKind(value: string): ReportKind {
  const kind = REPORT_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_KINDS.join(', ')}.`);
  }
  return kind;
}

const program = new Command();

program
  .name('tally')
  .description('Token usage and cost reports for AI coding assistants')
  .version('0.1.0');

addCommonOptions(
  program.command('daily', { isDefault: true }).description('Usage grouped by day')
).action(reportCommand('daily'));

addCommonOptions(
  program.command('monthly').description('Usage grouped by month')
).action(reportCommand('monthly'));

addCommonOptions(
  program.command('session').description('Usage grouped by project and session')
).action(reportCommand('session'));

addCommonOptions(
  program.command('model').description('Usage grouped by model')
).action(reportCommand('model'));

addCommonOptions(
  program
    .command('watch')
    .description('Redraw a report whenever session logs change')
    .argument('[report]', `Report to show (${REPORT_KINDS.join(', ')})`, parseReportKind, 'daily')
    .option('--interval <ms>', 'Quiet period before redrawing', parseIntervalOption)
).action(watchCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
