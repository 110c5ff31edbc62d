#!/usr/bin/env node

/**
 * interview-coach CLI entry point.
 */

import { createCliApp } from './app.js';
import { handleRunCommand } from './commands/run.js';
import { handleScenarioCommand } from './commands/scenario.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
interview-coach v${getVersionFromPackageJson()}

USAGE:
  interview-coach <command> [options]

COMMANDS:
  run         Conduct an interactive interview
  scenario    Replay a scripted interview from a JSON file
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  interview-coach run
  interview-coach run --max-turns 12 --log runs/alex.json
  interview-coach scenario scenarios/role-reversal.json
`;
  console.log(helpText);
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "interview-coach help" for usage information.');
}

const SESSION_OPTIONS = `OPTIONS:
  --config <path>    Config file (default: interview.toml when present)
  --log <path>       Session log (default: <runs>/interview_log_<stamp>.json)
  --report <path>    Final report; .yaml or .yml writes YAML
                     (default: beside the log as <log>.report.json)
  --max-turns <n>    Stop after n turns`;

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const commandHelp = new Map<string, string>([
    [
      'run',
      `
USAGE: interview-coach run [options]

Asks for the candidate's name, position, target grade and experience, then
alternates questions and answers. Type "стоп" or "stop", or end input
(Ctrl+D), to finish and get the final report.

${SESSION_OPTIONS}

ENVIRONMENT:
  INTERVIEW_DEBUG=true   Log model replies at debug level
  INTERVIEW_*            Override config values, e.g. INTERVIEW_MAX_TURNS=20
`,
    ],
    [
      'scenario',
      `
USAGE: interview-coach scenario <file> [options]

Replays the scripted candidate messages from <file>, one per turn, and
finishes when they run out. Exits with 1 if any flag listed in
"expected_flags" never appears in the hidden reflection.

${SESSION_OPTIONS}
`,
    ],
  ]);

  const help = commandHelp.get(commandName);
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "interview-coach help" to see all available commands.');
  }
}

/**
 * Runs a command handler with CLI context and standard error handling.
 */
function runWithContext(command: string, handler: CliCommandHandler, args: string[]): void {
  const context = createCliApp();
  context.args = args;
  withErrorHandling(() => handler(context), { command, display: context.config });
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  if (!command) {
    showHelp();
    process.exit(0);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'run':
    case 'scenario':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(0);
      }
      runWithContext(
        command,
        (context) =>
          command === 'run' ? handleRunCommand(context) : handleScenarioCommand(context),
        commandArgs
      );
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
