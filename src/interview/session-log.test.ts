import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  SessionLogError,
  assertValidSessionLog,
  buildSessionLog,
  defaultSessionLogPath,
  loadSessionLog,
  saveSessionLog,
  type SessionLogFile,
} from './session-log.js';
import { createEmptyFlags, createInitialInterviewState, type InterviewState } from './types.js';

const thoughts = '[Observer]: quality=3\n[Interviewer]: strategy=deepen';

function sampleState(): InterviewState {
  const base = createInitialInterviewState(
    {
      participant_name: 'Test Candidate',
      position: 'Backend Developer',
      grade_target: 'junior',
      experience_summary: 'One year of APIs',
    },
    Array.from({ length: 10 }, (_, i) => `topic ${String(i + 1)}`),
    3
  );
  return {
    ...base,
    turn_log: [
      {
        turn_id: 1,
        agent_visible_message: 'Расскажите о себе?',
        user_message: '',
        internal_thoughts: thoughts,
        topic: 'topic 1',
        difficulty_before: 3,
        difficulty_after: 3,
        flags: createEmptyFlags(),
        skills_delta: {},
        answer_quality: null,
        strategy: 'kickoff',
        expert_roles: [],
      },
    ],
  };
}

describe('buildSessionLog', () => {
  it('keeps only the logged turn fields', () => {
    expect(buildSessionLog(sampleState(), 'in progress')).toEqual({
      participant_name: 'Test Candidate',
      turns: [
        {
          turn_id: 1,
          agent_visible_message: 'Расскажите о себе?',
          user_message: '',
          internal_thoughts: thoughts,
        },
      ],
      final_feedback: 'in progress',
    });
  });
});

describe('defaultSessionLogPath', () => {
  it('stamps the file name with the local time', () => {
    expect(defaultSessionLogPath('runs', new Date(2026, 0, 5, 9, 7, 3))).toBe(
      join('runs', 'interview_log_20260105_090703.json')
    );
  });
});

describe('assertValidSessionLog', () => {
  it('rejects extra keys', () => {
    const log = { ...buildSessionLog(sampleState()), extra: true };

    expect(() => assertValidSessionLog(log)).toThrow(SessionLogError);
    expect(() => assertValidSessionLog(log)).toThrow('must NOT have additional properties');
  });

  it('rejects missing keys', () => {
    expect(() => assertValidSessionLog({ participant_name: 'x', turns: [] })).toThrow(
      "must have required property 'final_feedback'"
    );
  });

  it('rejects turns without Observer and Interviewer thoughts', () => {
    const log = buildSessionLog(sampleState());
    const broken: SessionLogFile = {
      ...log,
      turns: log.turns.map((turn) => ({ ...turn, internal_thoughts: '[Observer]: only' })),
    };

    expect(() => assertValidSessionLog(broken)).toThrow(
      'Invalid session log: turn 1 is missing Observer or Interviewer thoughts'
    );
  });

  it('rejects out-of-sequence turn ids', () => {
    const log = buildSessionLog(sampleState());
    const shifted: SessionLogFile = {
      ...log,
      turns: log.turns.map((turn) => ({ ...turn, turn_id: 2 })),
    };

    expect(() => assertValidSessionLog(shifted)).toThrow('turn 1 has turn_id 2');
  });
});

describe('saveSessionLog and loadSessionLog', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'session-log-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes pretty JSON atomically and reads it back', async () => {
    const target = join(tempDir, 'nested', 'log.json');
    const log = buildSessionLog(sampleState());

    await saveSessionLog(target, log);

    expect(await readFile(target, 'utf-8')).toBe(`${JSON.stringify(log, null, 2)}\n`);
    expect(await readdir(join(tempDir, 'nested'))).toEqual(['log.json']);
    expect(await loadSessionLog(target)).toEqual(log);
  });

  it('does not write an invalid log', async () => {
    const target = join(tempDir, 'invalid.json');
    const log = buildSessionLog(sampleState());

    await expect(
      saveSessionLog(target, { ...log, participant_name: 42 } as unknown as SessionLogFile)
    ).rejects.toThrow(SessionLogError);
    await expect(readFile(target, 'utf-8')).rejects.toThrow();
  });

  it('reports unparseable files', async () => {
    const target = join(tempDir, 'garbage.json');
    await writeFile(target, '{not json', 'utf-8');

    await expect(loadSessionLog(target)).rejects.toMatchObject({ errorType: 'parse_error' });
  });

  it('reports missing files', async () => {
    await expect(loadSessionLog(join(tempDir, 'missing.json'))).rejects.toMatchObject({
      errorType: 'file_error',
    });
  });
});
