import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { getDefaultConfig } from '../config/parser.js';
import {
  ClaudeCodeClient,
  parseClaudeOutput,
  resolveModelAlias,
} from './claude-code-client.js';
import { MODEL_ALIASES } from './types.js';

const mockExeca = vi.mocked(execa);

function mockExecaResult(options: {
  exitCode?: number | undefined;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
}): Awaited<ReturnType<typeof execa>> {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    failed: options.exitCode !== 0,
    timedOut: options.timedOut ?? false,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

function resultJson(result: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    type: 'result',
    subtype: 'success',
    is_error: false,
    duration_ms: 250,
    result,
    usage: { input_tokens: 12, output_tokens: 4 },
    ...extra,
  });
}

function lastArgs(): readonly string[] {
  const call = mockExeca.mock.calls.at(-1);
  const args: unknown = call?.[1];
  return Array.isArray(args) ? args.map(String) : [];
}

describe('parseClaudeOutput', () => {
  it('reads a single result object', () => {
    const parsed = parseClaudeOutput(resultJson('hello'));

    expect(parsed).toEqual({
      content: 'hello',
      usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 },
      modelId: 'unknown',
      latencyMs: 250,
      isError: false,
    });
  });

  it('prefers assistant text over the result summary in line-delimited output', () => {
    const stdout = [
      JSON.stringify({ type: 'system', subtype: 'init' }),
      JSON.stringify({
        type: 'assistant',
        message: {
          model: 'model-x',
          content: [
            { type: 'text', text: 'part one, ' },
            { type: 'tool_use', name: 'ignored' },
            { type: 'text', text: 'part two' },
          ],
        },
      }),
      'not json at all',
      resultJson('summary'),
    ].join('\n');

    const parsed = parseClaudeOutput(stdout);

    expect(parsed.content).toBe('part one, part two');
    expect(parsed.modelId).toBe('model-x');
  });

  it('reads an array of messages', () => {
    const stdout = JSON.stringify([{ type: 'system' }, JSON.parse(resultJson('from array'))]);

    expect(parseClaudeOutput(stdout).content).toBe('from array');
  });

  it('flags error results', () => {
    expect(parseClaudeOutput(resultJson('boom', { is_error: true })).isError).toBe(true);
  });

  it('returns empty content for empty output', () => {
    expect(parseClaudeOutput('').content).toBe('');
  });
});

describe('resolveModelAlias', () => {
  it('maps every alias to a configured model', () => {
    const { models } = getDefaultConfig();
    const resolved = MODEL_ALIASES.map((alias) => resolveModelAlias(alias, models));

    expect(resolved).toEqual(['sonnet', 'opus', 'sonnet', 'sonnet', 'opus']);
  });
});

describe('ClaudeCodeClient', () => {
  let client: ClaudeCodeClient;

  beforeEach(() => {
    vi.clearAllMocks();
    const config = getDefaultConfig();
    config.models.observer_model = 'observer-test-model';
    config.model_client.timeout_ms = 4321;
    client = new ClaudeCodeClient({ config });
  });

  it('invokes the CLI in print mode with the resolved model and system prompt', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 0, stdout: resultJson('ok') }));

    await client.complete({ modelAlias: 'observer', prompt: 'Assess.', systemPrompt: 'Be strict.' });

    expect(mockExeca).toHaveBeenCalledWith(
      'claude',
      [
        '-p',
        '--output-format',
        'json',
        '--model',
        'observer-test-model',
        '--no-session-persistence',
        '--system-prompt',
        'Be strict.',
        'Assess.',
      ],
      expect.objectContaining({ timeout: 4321, reject: false })
    );
  });

  it('omits an empty system prompt', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 0, stdout: resultJson('ok') }));

    await client.complete({ modelAlias: 'planner', prompt: 'Plan.', systemPrompt: '' });

    expect(lastArgs()).not.toContain('--system-prompt');
  });

  it('returns the parsed response on success', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 0, stdout: resultJson('{"a":1}') }));

    const result = await client.complete({
      modelAlias: 'expert',
      prompt: 'Review.',
      requestId: 'req-1',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.response.content).toBe('{"a":1}');
      expect(result.response.metadata.provider).toBe('claude-code');
      expect(result.response.metadata.latencyMs).toBe(250);
      expect(result.response.requestId).toBe('req-1');
    }
  });

  it('uses the per-request timeout', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 0, stdout: resultJson('ok') }));

    await client.complete({ modelAlias: 'planner', prompt: 'Plan.', timeoutMs: 99 });

    expect(mockExeca).toHaveBeenCalledWith(
      'claude',
      expect.any(Array),
      expect.objectContaining({ timeout: 99 })
    );
  });

  it('maps a timeout to a retryable TimeoutError', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: undefined, timedOut: true }));

    const result = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('TimeoutError');
      expect(result.error.retryable).toBe(true);
      expect(result.error.message).toBe('Request timed out after 4321ms');
    }
  });

  it('maps a process that never started to a ProcessError', async () => {
    mockExeca.mockResolvedValueOnce(
      mockExecaResult({ exitCode: undefined, stderr: 'spawn claude ENOENT' })
    );

    const result = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('ProcessError');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('maps a thrown spawn error to a ProcessError', async () => {
    mockExeca.mockRejectedValueOnce(new Error('invalid option'));

    const result = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('ProcessError');
      expect(result.error.message).toBe("Failed to start 'claude': invalid option");
    }
  });

  it('classifies rate limit and authentication failures', async () => {
    mockExeca.mockResolvedValueOnce(
      mockExecaResult({ exitCode: 1, stderr: 'Error: rate limit exceeded' })
    );
    const limited = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    mockExeca.mockResolvedValueOnce(
      mockExecaResult({ exitCode: 0, stdout: resultJson('Invalid API key', { is_error: true }) })
    );
    const unauthorized = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(limited.success ? 'ok' : limited.error.kind).toBe('RateLimitError');
    expect(unauthorized.success ? 'ok' : unauthorized.error.kind).toBe('AuthenticationError');
  });

  it('maps other non-zero exits to a retryable ModelError with the exit code', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 2, stderr: 'boom' }));

    const result = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(result.success).toBe(false);
    if (!result.success && result.error.kind === 'ModelError') {
      expect(result.error.errorCode).toBe('EXIT_2');
      expect(result.error.retryable).toBe(true);
      expect(result.error.message).toBe("'claude' failed with exit code 2: boom");
    } else {
      expect.unreachable('expected a ModelError');
    }
  });

  it('treats an empty reply as a retryable failure', async () => {
    mockExeca.mockResolvedValueOnce(mockExecaResult({ exitCode: 0, stdout: resultJson('  ') }));

    const result = await client.complete({ modelAlias: 'observer', prompt: 'x' });

    expect(result.success ? 'ok' : result.error.kind).toBe('ModelError');
  });
});
