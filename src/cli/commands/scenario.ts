/**
 * Scenario command handler for the interview-coach CLI.
 *
 * Replays a scripted scenario, prints the visible transcript, saves the log
 * and the report, then checks the expected flags.
 */

import { buildSessionLog, saveSessionLog } from '../../interview/session-log.js';
import { summarizeFeedback } from '../../interview/report.js';
import { assertExpectedFlags, loadScenario, runScenario } from '../../interview/scenario.js';
import { saveFinalFeedback } from '../../report/storage.js';
import { createRuntime } from '../app.js';
import { CliUsageError, parseSessionArgs } from '../args.js';
import {
  CANDIDATE_PROMPT,
  formatFinalFeedback,
  formatInterviewerLine,
} from '../feedback-display.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { wrapInBox } from '../utils/displayUtils.js';
import { resolveOutputPaths, type SessionCommandDeps } from './run.js';

/**
 * Handles the scenario command.
 *
 * @param context - The CLI context; `args` holds the scenario path and options.
 * @param deps - Overrides for output and the runtime.
 * @returns A promise resolving to the command result.
 * @throws ScenarioError with `expectation_failed` after saving, when expected
 * flags were not reported.
 */
export async function handleScenarioCommand(
  context: CliContext,
  deps: Omit<SessionCommandDeps, 'reader'> = {}
): Promise<CliCommandResult> {
  const args = parseSessionArgs(context.args);
  const [scenarioPath, ...rest] = args.positional;
  if (scenarioPath === undefined) {
    throw new CliUsageError('scenario requires a scenario file');
  }
  if (rest[0] !== undefined) {
    throw new CliUsageError(`Unexpected argument: ${rest[0]}`);
  }

  const scenario = await loadScenario(scenarioPath);
  const runtime = await createRuntime({
    ...deps.runtime,
    configPath: args.configPath,
    maxTurns: args.maxTurns,
  });
  const print = deps.print ?? ((line: string) => console.log(line));
  const { logPath, reportPath } = resolveOutputPaths(
    runtime.config.paths.runs,
    args,
    deps.now?.() ?? new Date()
  );

  const result = await runScenario(runtime.engine, scenario, {
    onTurn: (turn) => {
      if (turn.user_message !== '') {
        print(`${CANDIDATE_PROMPT}${turn.user_message}`);
      }
      print(formatInterviewerLine(turn.agent_visible_message, context.config));
    },
  });

  const state = runtime.engine.getState();
  if (state !== null) {
    await saveSessionLog(logPath, buildSessionLog(state));
  }
  await saveFinalFeedback(reportPath, result.feedback);
  runtime.logger.info('scenario_saved', {
    scenario: scenarioPath,
    logPath,
    reportPath,
    messagesUsed: result.messagesUsed,
    missingFlags: result.missingFlags,
  });

  print('');
  print(wrapInBox(formatFinalFeedback(result.feedback, context.config), context.config));
  print(summarizeFeedback(result.feedback));
  print(`Лог: ${logPath}`);
  print(`Отчёт: ${reportPath}`);

  assertExpectedFlags(result);
  return { exitCode: 0 };
}
