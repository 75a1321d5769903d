/**
 * Resolver configuration: zod schema with defaults, loadable from the
 * environment or a JSON file.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '../fetch/http-fetcher.js';
import { DEFAULT_ERROR_CACHE, DEFAULT_SUCCESS_CACHE } from '../robots/rule-cache.js';

/** Lower-case agent names and drop repeats, keeping the first occurrence. */
export function normalizeAgentNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const agent = name.trim().toLowerCase();
    if (agent) seen.add(agent);
  }
  return [...seen];
}

const CacheTierSchema = z.object({
  capacity: z.number().int().positive(),
  ttlMs: z.number().int().positive(),
});

export const ResolverConfigSchema = z.object({
  allowForbidden: z.boolean().default(true),
  agentNames: z
    .array(z.string().trim().min(1))
    .min(1)
    .transform(normalizeAgentNames)
    .default(['*']),
  successCache: CacheTierSchema.default(DEFAULT_SUCCESS_CACHE),
  errorCache: CacheTierSchema.default(DEFAULT_ERROR_CACHE),
  coalesceInFlight: z.boolean().default(false),
  http: z
    .object({
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
    })
    .default({}),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw config object, filling in defaults. Throws if invalid.
 */
export function parseResolverConfig(raw: unknown): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid resolver config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new Error(`Invalid resolver config: ${name} must be true or false, got "${env[name]}"`);
}

/** NaN for a non-numeric value, which the schema then rejects. */
function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name]?.trim();
  if (!value) return undefined;
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] {
  return (env[name] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Build the config from ROBOTS_* environment variables. ROBOTS_AGENT_NAME
 * comes first among agent names, followed by the comma-separated ROBOTS_AGENTS.
 */
export function loadResolverConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const agentNames = [...envList(env, 'ROBOTS_AGENT_NAME'), ...envList(env, 'ROBOTS_AGENTS')];

  return parseResolverConfig({
    allowForbidden: envBoolean(env, 'ROBOTS_ALLOW_FORBIDDEN'),
    agentNames: agentNames.length > 0 ? agentNames : undefined,
    successCache: {
      capacity: envInt(env, 'ROBOTS_CACHE_MAX') ?? DEFAULT_SUCCESS_CACHE.capacity,
      ttlMs: envInt(env, 'ROBOTS_CACHE_TTL_MS') ?? DEFAULT_SUCCESS_CACHE.ttlMs,
    },
    errorCache: {
      capacity: envInt(env, 'ROBOTS_ERROR_CACHE_MAX') ?? DEFAULT_ERROR_CACHE.capacity,
      ttlMs: envInt(env, 'ROBOTS_ERROR_CACHE_TTL_MS') ?? DEFAULT_ERROR_CACHE.ttlMs,
    },
    coalesceInFlight: envBoolean(env, 'ROBOTS_COALESCE'),
    http: {
      userAgent: env.ROBOTS_USER_AGENT?.trim() || undefined,
      timeoutMs: envInt(env, 'ROBOTS_TIMEOUT_MS'),
    },
  });
}

/** Read and validate a JSON config file. */
export function loadResolverConfigFile(path: string): ResolverConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to read resolver config ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseResolverConfig(raw);
}
