#!/usr/bin/env node
import { constants } from 'node:os';
import { printHelp, printVersion } from './cli/help.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';
import { redText, yellowText } from './cli/terminal.js';
import { loadConfig, resolveTaskFilePath } from './config/loader.js';
import { TaskStore, type LoadReport } from './store/task-store.js';
import { runInteractiveTui, type ExitReason } from './tui/interactive.js';

const VERSION = '0.1.0';

function describeWarnings(report: LoadReport, filePath: string): string | null {
  const count = report.warnings.length;
  if (count === 0) return null;
  return `Skipped ${count} malformed line${count === 1 ? '' : 's'} in ${filePath}`;
}

function exitCodeFor(reason: ExitReason): number {
  if (reason === 'quit') return 0;
  return 128 + constants.signals[reason];
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const flags = extractBooleanFlags(args, ['--help', '-h', '--version', '-v']);
  if (flags.has('--help') || flags.has('-h')) {
    printHelp();
    return;
  }
  if (flags.has('--version') || flags.has('-v')) {
    printVersion(VERSION);
    return;
  }

  try {
    if (args.length > 0) {
      throw new CliUsageError(`Unknown argument '${args[0] ?? ''}'. Run 'todo --help' for usage.`);
    }
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      throw new CliUsageError('todo needs an interactive terminal.');
    }

    const config = loadConfig();
    const filePath = resolveTaskFilePath(config);
    const store = new TaskStore(filePath);
    const report = store.load();
    for (const warning of report.warnings) {
      console.error(`${yellowText('Warning:')} ${warning.message}`);
    }

    const reason = await runInteractiveTui({
      store,
      view: config.interactive?.view ?? 'list',
      colorsDisabled: Boolean(config.interactive?.colors?.disable),
      message: describeWarnings(report, filePath),
    });
    process.exit(exitCodeFor(reason));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`${redText('Error:')} ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
