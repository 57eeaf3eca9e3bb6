#!/usr/bin/env node
/**
 * @fileoverview labelbook CLI
 *
 * Commands:
 *   labelbook demo                - Run the demo labelling session
 *   labelbook summary <report>    - Print the summary of a saved report
 *   labelbook help [command]      - Show help
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';

process.exitCode = runCli(process.argv.slice(2));
