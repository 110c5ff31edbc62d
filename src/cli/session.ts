/**
 * Interactive interview loop.
 *
 * Collects the intake, then alternates visible questions with candidate
 * answers until the engine finalizes. End of input finishes the session.
 */

import type { CycleOutcome, InterviewEngine } from '../interview/engine.js';
import {
  GRADE_TARGETS,
  isValidGradeTarget,
  type FinalFeedback,
  type GradeTarget,
  type InterviewIntake,
  type InterviewState,
} from '../interview/types.js';
import { CANDIDATE_PROMPT, formatInterviewerLine } from './feedback-display.js';
import type { InputReader, OutputWriter } from './types.js';
import { readNonEmptyLine } from './utils/input.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Thrown when input ends before the intake is complete.
 */
export class IntakeAbortedError extends Error {
  constructor() {
    super('Input ended before the intake was complete');
    this.name = 'IntakeAbortedError';
  }
}

async function requireLine(reader: InputReader, prompt: string): Promise<string> {
  const line = await readNonEmptyLine(reader, prompt);
  if (line === null) {
    throw new IntakeAbortedError();
  }
  return line;
}

/**
 * Asks for the candidate's name, the position, the target grade and a short
 * experience summary. The grade is asked again until it is valid.
 *
 * @throws IntakeAbortedError if input ends first.
 */
export async function collectIntake(
  reader: InputReader,
  print: OutputWriter
): Promise<InterviewIntake> {
  const participantName = await requireLine(reader, 'Имя кандидата: ');
  const position = await requireLine(reader, 'Позиция: ');

  const gradePrompt = `Целевой грейд (${GRADE_TARGETS.join('/')}): `;
  let grade: GradeTarget | undefined;
  while (grade === undefined) {
    const answer = (await requireLine(reader, gradePrompt)).toLowerCase();
    if (isValidGradeTarget(answer)) {
      grade = answer;
    } else {
      print(`Неизвестный грейд: ${answer}`);
    }
  }

  const experience = await requireLine(reader, 'Кратко об опыте: ');

  return {
    participant_name: participantName,
    position,
    grade_target: grade,
    experience_summary: experience,
  };
}

/**
 * Options for an interactive session.
 */
export interface InteractiveSessionOptions {
  readonly reader: InputReader;
  readonly print: OutputWriter;
  readonly display: DisplayOptions;
  /** Called after every cycle with the current state, kickoff included. */
  readonly onCycle?: ((state: InterviewState) => Promise<void>) | undefined;
}

/**
 * Runs the question and answer loop on a fresh engine.
 *
 * Blank answers are asked for again without running a cycle.
 *
 * @returns The final feedback.
 */
export async function runInteractiveSession(
  engine: InterviewEngine,
  intake: InterviewIntake,
  options: InteractiveSessionOptions
): Promise<FinalFeedback> {
  const afterCycle = async (outcome: CycleOutcome): Promise<CycleOutcome> => {
    const state = engine.getState();
    if (state !== null) {
      await options.onCycle?.(state);
    }
    return outcome;
  };

  let outcome = await afterCycle(await engine.start(intake));

  while (outcome.kind === 'question') {
    options.print(formatInterviewerLine(outcome.turn.agent_visible_message, options.display));
    const answer = await readNonEmptyLine(options.reader, CANDIDATE_PROMPT);
    outcome = await afterCycle(
      answer === null ? await engine.finish() : await engine.submit(answer)
    );
  }

  return outcome.feedback;
}
