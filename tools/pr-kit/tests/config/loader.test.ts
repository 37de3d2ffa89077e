import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, mergeConfigs } from '../../src/config/loader.js';
import { ValidationError } from '../../src/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;
  let globalPath: string;
  let repoDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pr-origin-config-'));
    globalPath = path.join(tmpDir, 'global.yaml');
    repoDir = path.join(tmpDir, 'repo');
    fs.mkdirSync(repoDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeRepoConfig(content: string): void {
    fs.writeFileSync(path.join(repoDir, '.pr-origin.yaml'), content);
  }

  it('returns the embedded defaults when no file exists', () => {
    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.github).toEqual({ host: 'github.com' });
    expect(config.authoring).toEqual({
      mode: 'PASS_THRU',
      default_author: 'Migration Bot <migration-bot@localhost>',
      allowlist: [],
    });
    expect(config.origin).toBeUndefined();
  });

  it('merges github and authoring key by key', () => {
    fs.writeFileSync(globalPath, 'github:\n  cache_dir: /var/cache/prs\nauthoring:\n  mode: OVERWRITE\n');
    writeRepoConfig('github:\n  host: ghe.example.com\norigin:\n  url: https://ghe.example.com/acme/widgets\n');

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.github).toEqual({ host: 'ghe.example.com', cache_dir: '/var/cache/prs' });
    expect(config.authoring?.mode).toBe('OVERWRITE');
    expect(config.authoring?.default_author).toBe('Migration Bot <migration-bot@localhost>');
    expect(config.origin?.url).toBe('https://ghe.example.com/acme/widgets');
  });

  it('replaces the global origin with the repo origin', () => {
    fs.writeFileSync(globalPath, 'origin:\n  url: https://github.com/acme/old\n  use_merge: true\n');
    writeRepoConfig('origin:\n  url: https://github.com/acme/widgets\n');

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.origin).toEqual({ url: 'https://github.com/acme/widgets' });
  });

  it('reads an explicit config file instead of the repo config', () => {
    writeRepoConfig('origin:\n  url: https://github.com/acme/widgets\n');
    const explicit = path.join(tmpDir, 'other.yaml');
    fs.writeFileSync(explicit, 'origin:\n  url: https://github.com/acme/gadgets\n  required_labels: [ready]\n');

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir, configPath: explicit });

    expect(config.origin?.url).toBe('https://github.com/acme/gadgets');
    expect(config.origin?.required_labels).toEqual(['ready']);
  });

  it('rejects a missing explicit config file', () => {
    const missing = path.join(tmpDir, 'missing.yaml');

    expect(() => loadConfig({ globalConfigPath: globalPath, repoPath: repoDir, configPath: missing })).toThrow(
      new ValidationError(`Config file not found: ${missing}`),
    );
  });

  it('rejects retryable labels that are not required', () => {
    writeRepoConfig('origin:\n  url: https://github.com/acme/widgets\n  required_labels: [ready]\n  retryable_labels: [ci-pending]\n');

    expect(() => loadConfig({ globalConfigPath: globalPath, repoPath: repoDir })).toThrow(
      `Invalid config at ${path.join(repoDir, '.pr-origin.yaml')}: retryable_labels must be a subset of required_labels`,
    );
  });

  it('rejects review approvers without a review policy', () => {
    writeRepoConfig('origin:\n  url: https://github.com/acme/widgets\n  review_approvers: [OWNER]\n');

    expect(() => loadConfig({ globalConfigPath: globalPath, repoPath: repoDir })).toThrow(
      'review_approvers requires review_state to be set',
    );
  });

  it('rejects malformed YAML', () => {
    writeRepoConfig('origin: [unclosed\n');

    expect(() => loadConfig({ globalConfigPath: globalPath, repoPath: repoDir })).toThrow(ValidationError);
  });
});

describe('mergeConfigs', () => {
  it('returns the base when there is no override', () => {
    const base = { github: { host: 'github.com' } };

    expect(mergeConfigs(base, null)).toBe(base);
  });
});
