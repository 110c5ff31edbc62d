/**
 * Tests for CLI context and runtime wiring.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createCliApp, createRuntime } from './app.js';
import { ConfigParseError } from '../config/index.js';
import { aliasRouter } from '../../test-fixtures/model/router.js';
import { TEST_INTAKE } from '../../test-fixtures/interview/collaborators.js';
import { TEST_QUESTION, interviewScripts } from '../../test-fixtures/model/interview-scripts.js';

describe('createCliApp', () => {
  it('turns colors off when NO_COLOR is set', () => {
    const context = createCliApp({}, { NO_COLOR: '1' });

    expect(context.config).toEqual({ colors: false, unicode: true });
  });

  it('allows override via function parameter', () => {
    const context = createCliApp({ colors: true, unicode: false }, { NO_COLOR: '1' });

    expect(context.config).toEqual({ colors: true, unicode: false });
  });
});

describe('createRuntime', () => {
  let tempDir: string;
  let configPath: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cli-runtime-test-'));
    configPath = join(tempDir, 'interview.toml');
    await writeFile(configPath, '[interview]\nmax_turns = 7\nexpert_dispatch = "concurrent"\n');
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the config file and applies the turn budget override', async () => {
    const router = aliasRouter(interviewScripts());

    const fromFile = await createRuntime({ configPath, env: {}, router });
    const overridden = await createRuntime({ configPath, env: {}, router, maxTurns: 3 });

    expect(fromFile.config.interview.max_turns).toBe(7);
    expect(fromFile.config.interview.expert_dispatch).toBe('concurrent');
    expect(overridden.config.interview.max_turns).toBe(3);
  });

  it('lets the environment override the file', async () => {
    const runtime = await createRuntime({
      configPath,
      env: { INTERVIEW_MAX_TURNS: '9' },
      router: aliasRouter(interviewScripts()),
    });

    expect(runtime.config.interview.max_turns).toBe(9);
  });

  it('enables debug logging from INTERVIEW_DEBUG', async () => {
    const lines: string[] = [];
    const runtime = await createRuntime({
      configPath,
      env: { INTERVIEW_DEBUG: 'true' },
      router: aliasRouter(interviewScripts()),
      sink: (line) => lines.push(line),
    });

    runtime.logger.debug('probe');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'debug',
      component: 'cli',
      event: 'probe',
    });
  });

  it('wires the engine to the model-backed agents', async () => {
    const router = aliasRouter(interviewScripts());
    const runtime = await createRuntime({ configPath, env: {}, router, sink: () => {} });

    const outcome = await runtime.engine.start(TEST_INTAKE);

    expect(outcome).toMatchObject({ kind: 'question', turn: { agent_visible_message: TEST_QUESTION } });
    expect(router.complete.mock.calls.map(([request]) => request.modelAlias)).toEqual([
      'planner',
      'observer',
      'interviewer',
    ]);
  });

  it('rejects a missing config file', async () => {
    await expect(
      createRuntime({ configPath: join(tempDir, 'absent.toml'), env: {} })
    ).rejects.toThrow(ConfigParseError);
  });
});
