/**
 * @fileoverview Detailed help text for labelbook CLI commands
 */

const HELP_TEXT = {
  main: `
labelbook - data annotation bookkeeping

USAGE:
    labelbook <command> [options]

COMMANDS:
    demo                Run the demo labelling session and write its exports
    summary <report>    Print the summary of a saved JSON report
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Print errors (and summary output) as JSON
`,

  demo: `
labelbook demo - Run the demo labelling session

USAGE:
    labelbook demo [--out <dir>] [--config <file>] [--quiet]

OPTIONS:
    --out <dir>         Directory for the report and CSV (default: output.dir)
    --config <file>     Configuration file (default: ./labelbook.config.yaml)
    --quiet             Suppress log lines on stderr

Annotates five images, scores the first three, records two pairwise
decisions, checks label consistency, then writes annotation_report.json and
annotations.csv.
`,

  summary: `
labelbook summary - Print the summary of a saved report

USAGE:
    labelbook summary <report.json> [--json]

The report is validated before it is printed; a malformed file exits with a
validation error.
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
