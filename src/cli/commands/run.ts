/**
 * Run command handler for the interview-coach CLI.
 *
 * Conducts one interactive interview on stdin and stdout. The session log is
 * rewritten after every turn; the report is saved once the interview ends.
 */

import {
  buildSessionLog,
  defaultSessionLogPath,
  saveSessionLog,
} from '../../interview/session-log.js';
import { summarizeFeedback } from '../../interview/report.js';
import { reportPathForLog, saveFinalFeedback } from '../../report/storage.js';
import { createRuntime, type RuntimeOptions } from '../app.js';
import { CliUsageError, parseSessionArgs } from '../args.js';
import { formatFinalFeedback } from '../feedback-display.js';
import { collectIntake, runInteractiveSession } from '../session.js';
import type { CliCommandResult, CliContext, InputReader, OutputWriter } from '../types.js';
import { wrapInBox } from '../utils/displayUtils.js';
import { createInputReader } from '../utils/input.js';

/** Placeholder for `final_feedback` while the interview is running. */
export const IN_PROGRESS_SUMMARY = 'Интервью продолжается';

/**
 * Collaborators a run can be given instead of the process defaults.
 */
export interface SessionCommandDeps {
  readonly reader?: InputReader | undefined;
  readonly print?: OutputWriter | undefined;
  readonly runtime?: RuntimeOptions | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * Resolves where the log and the report go.
 */
export function resolveOutputPaths(
  runsDir: string,
  options: { logPath?: string | undefined; reportPath?: string | undefined },
  now: Date
): { logPath: string; reportPath: string } {
  const logPath = options.logPath ?? defaultSessionLogPath(runsDir, now);
  return { logPath, reportPath: options.reportPath ?? reportPathForLog(logPath) };
}

/**
 * Handles the run command.
 *
 * @param context - The CLI context.
 * @param deps - Overrides for input, output and the runtime.
 * @returns A promise resolving to the command result.
 */
export async function handleRunCommand(
  context: CliContext,
  deps: SessionCommandDeps = {}
): Promise<CliCommandResult> {
  const args = parseSessionArgs(context.args);
  const unexpected = args.positional[0];
  if (unexpected !== undefined) {
    throw new CliUsageError(`Unexpected argument: ${unexpected}`);
  }

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

  const reader = deps.reader ?? createInputReader();
  try {
    const intake = await collectIntake(reader, print);
    const feedback = await runInteractiveSession(runtime.engine, intake, {
      reader,
      print,
      display: context.config,
      onCycle: (state) => saveSessionLog(logPath, buildSessionLog(state, IN_PROGRESS_SUMMARY)),
    });

    await saveFinalFeedback(reportPath, feedback);
    runtime.logger.info('run_saved', { logPath, reportPath });

    print('');
    print(wrapInBox(formatFinalFeedback(feedback, context.config), context.config));
    print(summarizeFeedback(feedback));
    return { exitCode: 0, message: `Лог: ${logPath}\nОтчёт: ${reportPath}` };
  } finally {
    reader.close();
  }
}
