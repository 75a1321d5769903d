import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  loadResolverConfig,
  loadResolverConfigFile,
  normalizeAgentNames,
  parseResolverConfig,
} from '../config/resolver-config.js';

describe('parseResolverConfig', () => {
  it('fills in defaults', () => {
    expect(parseResolverConfig({})).toEqual({
      allowForbidden: true,
      agentNames: ['*'],
      successCache: { capacity: 10_000, ttlMs: 21_600_000 },
      errorCache: { capacity: 10_000, ttlMs: 3_600_000 },
      coalesceInFlight: false,
      http: { userAgent: 'robots-resolver/0.1', timeoutMs: 10_000, maxBodyBytes: 524_288 },
    });
  });

  it('normalizes agent names', () => {
    const config = parseResolverConfig({ agentNames: ['MyBot', ' mybot ', 'Other'] });
    expect(config.agentNames).toEqual(['mybot', 'other']);
  });

  it('keeps partial http settings alongside defaults', () => {
    const config = parseResolverConfig({ http: { timeoutMs: 2500 } });
    expect(config.http).toEqual({
      userAgent: 'robots-resolver/0.1',
      timeoutMs: 2500,
      maxBodyBytes: 524_288,
    });
  });

  it('rejects a non-positive capacity with the offending path', () => {
    expect(() => parseResolverConfig({ successCache: { capacity: 0, ttlMs: 1000 } })).toThrow(
      /^Invalid resolver config: successCache\.capacity: /
    );
  });

  it('rejects an empty agent list', () => {
    expect(() => parseResolverConfig({ agentNames: [] })).toThrow(/agentNames/);
  });

  it('rejects a non-object', () => {
    expect(() => parseResolverConfig('nope')).toThrow(/^Invalid resolver config: \(root\): /);
  });
});

describe('normalizeAgentNames', () => {
  it('drops blanks and repeats while keeping order', () => {
    expect(normalizeAgentNames(['B', 'a', '', 'b', '*'])).toEqual(['b', 'a', '*']);
  });
});

describe('loadResolverConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadResolverConfig({})).toEqual(parseResolverConfig({}));
  });

  it('reads ROBOTS_* variables', () => {
    const config = loadResolverConfig({
      ROBOTS_ALLOW_FORBIDDEN: 'false',
      ROBOTS_AGENT_NAME: 'MyBot',
      ROBOTS_AGENTS: 'helper, *',
      ROBOTS_CACHE_MAX: '500',
      ROBOTS_ERROR_CACHE_TTL_MS: '60000',
      ROBOTS_COALESCE: 'yes',
      ROBOTS_USER_AGENT: 'MyBot/2.0',
      ROBOTS_TIMEOUT_MS: '3000',
    });

    expect(config.allowForbidden).toBe(false);
    expect(config.agentNames).toEqual(['mybot', 'helper', '*']);
    expect(config.successCache).toEqual({ capacity: 500, ttlMs: 21_600_000 });
    expect(config.errorCache).toEqual({ capacity: 10_000, ttlMs: 60_000 });
    expect(config.coalesceInFlight).toBe(true);
    expect(config.http.userAgent).toBe('MyBot/2.0');
    expect(config.http.timeoutMs).toBe(3000);
  });

  it('rejects an unrecognised boolean', () => {
    expect(() => loadResolverConfig({ ROBOTS_ALLOW_FORBIDDEN: 'maybe' })).toThrow(
      'Invalid resolver config: ROBOTS_ALLOW_FORBIDDEN must be true or false, got "maybe"'
    );
  });

  it('rejects a non-numeric size', () => {
    expect(() => loadResolverConfig({ ROBOTS_CACHE_MAX: 'lots' })).toThrow(
      /successCache\.capacity/
    );
  });
});

describe('loadResolverConfigFile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads and validates a JSON file', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'robots-config-'));
    const file = path.join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ allowForbidden: false, agentNames: ['FileBot'] }));

    const config = loadResolverConfigFile(file);
    expect(config.allowForbidden).toBe(false);
    expect(config.agentNames).toEqual(['filebot']);
  });

  it('reports unreadable files', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'robots-config-'));
    const file = path.join(dir, 'missing.json');

    expect(() => loadResolverConfigFile(file)).toThrow(
      new RegExp(`^Failed to read resolver config ${file.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}: `)
    );
  });
});
