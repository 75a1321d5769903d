#!/usr/bin/env node
/**
 * CLI entry point for robots-resolver
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import {
  loadResolverConfig,
  loadResolverConfigFile,
  parseResolverConfig,
} from './config/resolver-config.js';
import type { ResolverConfig } from './config/resolver-config.js';
import { HttpFetcher } from './fetch/http-fetcher.js';
import { deriveKey } from './robots/origin-key.js';
import { RobotsResolver } from './robots/resolver.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  url: string;
  paths: string[];
  agents: string[];
  json: boolean;
  forbidOn403: boolean;
  timeout?: number;
  configFile?: string;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const paths: string[] = [];
  const agents: string[] = [];
  let json = false;
  let forbidOn403 = false;
  let timeout: number | undefined;
  let configFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--forbid-on-403':
        forbidOn403 = true;
        break;
      case '--path':
        if (i + 1 >= args.length) return { kind: 'error', message: '--path requires a value' };
        paths.push(args[++i]);
        break;
      case '--agent':
        if (i + 1 >= args.length) return { kind: 'error', message: '--agent requires a value' };
        agents.push(args[++i]);
        break;
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: '--config requires a value' };
        configFile = args[++i];
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        timeout = v;
        break;
      }
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  const url = positional[0];
  if (!/^https?:\/\//i.test(url) || !URL.canParse(url)) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }

  return {
    kind: 'ok',
    opts: { url, paths, agents, json, forbidOn403, timeout, configFile },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: robots-resolver <url> [options]

Resolves the robots.txt rules for the origin of <url> and reports whether
each path may be crawled (default: the path of <url>).

Options:
  --path <path>       Path to check, repeatable
  --agent <name>      Robot name to match in robots.txt, repeatable, most specific first
                      (env: ROBOTS_AGENT_NAME, ROBOTS_AGENTS)
  --forbid-on-403     Treat HTTP 403 on robots.txt as "disallow everything"
  --timeout <ms>      Request timeout in milliseconds (default: 10000)
  --config <file>     JSON configuration file (default: ROBOTS_* environment variables)
  --json              JSON output
  -v, --version       Show version number
  -h, --help          Show this help message`);
}

/** Combine file or environment config with command-line overrides. */
function buildConfig(opts: CliOptions): ResolverConfig {
  const base = opts.configFile ? loadResolverConfigFile(opts.configFile) : loadResolverConfig();
  return parseResolverConfig({
    ...base,
    allowForbidden: opts.forbidOn403 ? false : base.allowForbidden,
    agentNames: opts.agents.length > 0 ? opts.agents : base.agentNames,
    http: { ...base.http, timeoutMs: opts.timeout ?? base.http.timeoutMs },
  });
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`robots-resolver ${getVersion()}`);
      process.exit(0);
      return;
    case 'help':
      printUsage();
      process.exit(0);
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  let config: ResolverConfig;
  try {
    config = buildConfig(opts);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
    return;
  }

  const resolver = RobotsResolver.fromConfig(config);
  const ruleSet = await resolver.resolve(new HttpFetcher(config.http), opts.url);

  const target = new URL(opts.url);
  const origin = deriveKey(target);
  const paths = opts.paths.length > 0 ? opts.paths : [`${target.pathname}${target.search}`];
  const decisions = paths.map((path) => ({ path, allowed: ruleSet.isAllowed(path) }));

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          url: opts.url,
          origin,
          policy: ruleSet.policy.kind,
          crawlDelayMs: ruleSet.crawlDelayMs,
          sitemaps: ruleSet.sitemaps,
          paths: decisions,
        },
        null,
        2
      )
    );
    return;
  }

  console.log(`Origin: ${origin}`);
  console.log(`Policy: ${ruleSet.policy.kind}`);
  if (ruleSet.crawlDelayMs !== null) console.log(`Crawl-delay: ${ruleSet.crawlDelayMs}ms`);
  for (const sitemap of ruleSet.sitemaps) {
    console.log(`Sitemap: ${sitemap}`);
  }
  for (const { path, allowed } of decisions) {
    console.log(`${allowed ? 'ALLOW' : 'DISALLOW'} ${path}`);
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // undici keeps idle keep-alive sockets open for a few seconds; don't wait for them
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
