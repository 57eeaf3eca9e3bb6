/**
 * @fileoverview CLI dispatcher
 *
 * Parses argv, routes to a command and turns any failure into a formatted
 * message on stderr plus an exit code. Never throws.
 */

import { parseArgs } from 'node:util';
import { LABELBOOK_VERSION } from '../version.js';
import { demoCommand } from './commands/demo.js';
import { summaryCommand } from './commands/summary.js';
import { createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'demo' | 'summary' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  demo: {
    description: 'Run the demo labelling session',
    usage: 'labelbook demo [--out <dir>] [--config <file>] [--quiet]',
  },
  summary: {
    description: 'Print the summary of a saved report',
    usage: 'labelbook summary <report.json> [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'labelbook help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export interface RunCliOptions {
  cwd?: string;
}

/**
 * Run the CLI with the given arguments (without the node and script path).
 * Returns the process exit code.
 */
export function runCli(argv: string[], options: RunCliOptions = {}): number {
  const jsonMode = argv.includes('--json');

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        json: { type: 'boolean', default: false },
        quiet: { type: 'boolean', default: false },
        out: { type: 'string' },
        config: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    });

    if (values.version) {
      console.log(`labelbook ${LABELBOOK_VERSION.string}`);
      return 0;
    }

    const [command, ...commandArgs] = positionals;

    if (values.help || !command || command === 'help') {
      showHelp(command === 'help' ? commandArgs[0] : command);
      return 0;
    }

    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
        available: Object.keys(COMMANDS),
      });
    }

    switch (command) {
      case 'demo':
        demoCommand({
          out: values.out,
          configPath: values.config,
          cwd: options.cwd,
          quiet: values.quiet,
        });
        break;
      case 'summary':
        summaryCommand({ args: commandArgs, cwd: options.cwd, json: values.json });
        break;
    }
    return 0;
  } catch (error) {
    const normalized =
      error instanceof TypeError && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS')
        ? createError('INVALID_ARGUMENT', error.message)
        : error;
    console.error(jsonMode ? formatErrorJson(normalized) : formatError(normalized));
    return getExitCode(normalized);
  }
}
