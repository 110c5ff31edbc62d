import { describe, it, expect } from 'vitest';
import {
  VERSION,
  InterviewEngine,
  createModelCollaborators,
  getDefaultConfig,
  loadConfig,
  silentLogger,
} from './index.js';
import { getVersionFromPackageJson } from './cli/commands/version.js';

describe('package entry', () => {
  it('matches the package.json version', () => {
    expect(VERSION).toBe(getVersionFromPackageJson());
  });

  it('exposes the engine, the agents and the config loader', () => {
    expect(typeof InterviewEngine).toBe('function');
    expect(typeof createModelCollaborators).toBe('function');
    expect(typeof loadConfig).toBe('function');
    expect(getDefaultConfig().interview.max_turns).toBeGreaterThan(0);
    expect(silentLogger).toBeDefined();
  });
});
