import { describe, it, expect } from 'vitest';
import { CliUsageError, parseSessionArgs } from './args.js';

describe('parseSessionArgs', () => {
  it('returns only positionals when no options are given', () => {
    expect(parseSessionArgs(['scenario.json'])).toEqual({ positional: ['scenario.json'] });
  });

  it('reads every option', () => {
    expect(
      parseSessionArgs([
        '--config',
        'custom.toml',
        'a.json',
        '--log',
        'runs/log.json',
        '--report',
        'runs/report.yaml',
        '--max-turns',
        '12',
      ])
    ).toEqual({
      positional: ['a.json'],
      configPath: 'custom.toml',
      logPath: 'runs/log.json',
      reportPath: 'runs/report.yaml',
      maxTurns: 12,
    });
  });

  it('rejects an option without a value', () => {
    expect(() => parseSessionArgs(['--log'])).toThrow('--log requires a value');
    expect(() => parseSessionArgs(['--log', '--config', 'x'])).toThrow('--log requires a value');
  });

  it('rejects invalid turn budgets', () => {
    for (const value of ['0', '-3', '2.5', 'ten']) {
      expect(() => parseSessionArgs(['--max-turns', value])).toThrow(
        `--max-turns expects a positive integer, got: ${value}`
      );
    }
  });

  it('rejects unknown options', () => {
    expect(() => parseSessionArgs(['--verbose', 'yes'])).toThrow(CliUsageError);
  });
});
