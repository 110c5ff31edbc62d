import { describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  assertConfigValid,
  ConfigParseError,
  ConfigValidationError,
  getDefaultConfig,
  loadConfig,
  validateConfig,
  type PathChecker,
} from './index.js';

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('rejects a gap threshold that is not below the confirmed threshold', () => {
    const config = getDefaultConfig();
    config.thresholds.gap_skill = 0.6;

    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['thresholds.gap_skill']);
  });

  it('rejects skill thresholds outside 0..1', () => {
    const config = getDefaultConfig();
    config.thresholds.confirmed_skill = 1.5;

    const fields = validateConfig(config).errors.map((e) => e.field);

    expect(fields).toContain('thresholds.confirmed_skill');
  });

  it('rejects a lower difficulty threshold that is not below the raise threshold', () => {
    const config = getDefaultConfig();
    config.thresholds.lower_difficulty_quality = 4;

    const fields = validateConfig(config).errors.map((e) => e.field);

    expect(fields).toEqual(['thresholds.lower_difficulty_quality']);
  });

  it('rejects an initial difficulty outside 1..5 or not an integer', () => {
    const config = getDefaultConfig();
    config.interview.initial_difficulty = 6;
    expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
      'interview.initial_difficulty',
    ]);

    config.interview.initial_difficulty = 2.5;
    expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
      'interview.initial_difficulty',
    ]);
  });

  it('rejects non-positive counts', () => {
    const config = getDefaultConfig();
    config.interview.max_turns = 0;
    config.interview.max_question_chars = -1;
    config.model_client.timeout_ms = 1.5;

    const fields = validateConfig(config).errors.map((e) => e.field);

    expect(fields).toEqual([
      'interview.max_question_chars',
      'interview.max_turns',
      'model_client.timeout_ms',
    ]);
  });

  it('rejects empty model names and empty lists', () => {
    const config = getDefaultConfig();
    config.models.expert_model = ' ';
    config.interview.stop_commands = [''];
    config.interview.skill_vocabulary = [];

    const fields = validateConfig(config).errors.map((e) => e.field);

    expect(fields).toEqual([
      'models.expert_model',
      'interview.stop_commands',
      'interview.skill_vocabulary',
    ]);
  });

  it('checks the prompt directory only when a checker is given', () => {
    const config = getDefaultConfig();
    config.paths.prompts = '/nowhere';
    const checker: PathChecker = () => ({ exists: false });

    expect(validateConfig(config).valid).toBe(true);
    expect(validateConfig(config, { pathChecker: checker }).errors[0]?.message).toBe(
      "Path does not exist: '/nowhere'"
    );
  });

  it('reports a prompt path that is a file', () => {
    const config = getDefaultConfig();
    config.paths.prompts = '/tmp/file.md';
    const checker: PathChecker = () => ({ exists: true, isDirectory: false });

    expect(validateConfig(config, { pathChecker: checker }).errors[0]?.message).toBe(
      "Path exists but is not a directory: '/tmp/file.md'"
    );
  });
});

describe('assertConfigValid', () => {
  it('throws with every failed field', () => {
    const config = getDefaultConfig();
    config.interview.max_turns = 0;
    config.thresholds.gap_skill = 0.9;

    try {
      assertConfigValid(config);
      expect.unreachable('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors).toHaveLength(2);
        expect(error.message).toMatch(/failed with 2 error\(s\)/);
      }
    }
  });
});

describe('loadConfig', () => {
  it('reads an explicit file and applies environment overrides', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'config-load-'));
    try {
      const path = join(dir, 'custom.toml');
      await writeFile(path, '[interview]\nmax_turns = 9\nrecent_turns_window = 2\n', 'utf-8');

      const config = await loadConfig({ path, env: { INTERVIEW_MAX_TURNS: '11' } });

      expect(config.interview.max_turns).toBe(11);
      expect(config.interview.recent_turns_window).toBe(2);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig({ path: '/definitely/missing.toml', env: {} })).rejects.toThrow(
      ConfigParseError
    );
  });

  it('fails validation after overrides are merged', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'config-load-'));
    try {
      const path = join(dir, 'custom.toml');
      await writeFile(path, '', 'utf-8');

      await expect(
        loadConfig({ path, env: { INTERVIEW_INITIAL_DIFFICULTY: '9' } })
      ).rejects.toThrow(ConfigValidationError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
