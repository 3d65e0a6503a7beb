import { ConfigError } from './errors.js';
import type { ExhaustionPolicy, RoleSource } from './types.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ThrottlePolicy {
  pageDelayMs: number;
  pageDelayJitterMs: number;
}

export interface ProfileUrlRule {
  host: string;
  pathPrefix: string;
}

export interface RunConfig {
  headless: boolean;
  roles: RoleSource[];
  targetPerRole: number;
  retry: RetryPolicy;
  throttle: ThrottlePolicy;
  timeoutMs: number;
  scrollPasses: number;
  maxPages: number;
  maxFailedPages: number;
  onExhausted: ExhaustionPolicy;
  syntheticCount: number;
  profileUrl: ProfileUrlRule;
  outputFile: string;
  markersFile: string;
  fallbackNamesFile: string;
  logDir: string;
}

export const DEFAULT_ROLES: RoleSource[] = [
  { roleType: 'UGC Creator', listingUrl: 'https://www.twine.net/find/ugc-creators' },
  { roleType: 'Video Editor', listingUrl: 'https://www.twine.net/find/video-editors' },
];

export function defaultConfig(): RunConfig {
  return {
    headless: true,
    roles: DEFAULT_ROLES.map((role) => ({ ...role })),
    targetPerRole: 50,
    retry: {
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 8000,
    },
    throttle: {
      pageDelayMs: 1500,
      pageDelayJitterMs: 500,
    },
    timeoutMs: 15000,
    scrollPasses: 3,
    maxPages: 10,
    maxFailedPages: 2,
    onExhausted: 'skip',
    syntheticCount: 10,
    profileUrl: {
      host: 'www.twine.net',
      pathPrefix: '/profile/',
    },
    outputFile: 'data/scraped_profiles.csv',
    markersFile: 'data/quality_markers.json',
    fallbackNamesFile: 'data/fallback_names.json',
    logDir: 'logs',
  };
}

function positiveInt(raw: string, fallback: number): number {
  const parsed = Number(raw);
  if (Number.isFinite(parsed) && parsed > 0) {
    return Math.floor(parsed);
  }
  return fallback;
}

function nonNegativeInt(raw: string, fallback: number): number {
  const parsed = Number(raw);
  if (Number.isFinite(parsed) && parsed >= 0) {
    return Math.floor(parsed);
  }
  return fallback;
}

function parseExhaustionPolicy(raw: string): ExhaustionPolicy {
  if (raw === 'skip' || raw === 'synthesize') {
    return raw;
  }
  throw new ConfigError(`--on-exhausted must be "skip" or "synthesize", got "${raw}"`);
}

const VALUE_FLAGS = new Set([
  '--target',
  '--base-delay',
  '--max-delay',
  '--max-attempts',
  '--page-delay',
  '--page-jitter',
  '--timeout',
  '--max-pages',
  '--max-failed-pages',
  '--on-exhausted',
  '--synthetic-count',
  '--output',
  '--markers',
  '--log-dir',
]);

export function parseArgs(argv: string[], base: RunConfig = defaultConfig()): RunConfig {
  const config: RunConfig = {
    ...base,
    retry: { ...base.retry },
    throttle: { ...base.throttle },
    profileUrl: { ...base.profileUrl },
    roles: base.roles.map((role) => ({ ...role })),
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === '--headful') {
      config.headless = false;
      continue;
    }
    if (arg === '--headless') {
      config.headless = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      continue;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`${arg} needs a value`);
    }

    switch (arg) {
      case '--target':
        config.targetPerRole = positiveInt(value, config.targetPerRole);
        break;
      case '--base-delay':
        config.retry.baseDelayMs = nonNegativeInt(value, config.retry.baseDelayMs);
        break;
      case '--max-delay':
        config.retry.maxDelayMs = nonNegativeInt(value, config.retry.maxDelayMs);
        break;
      case '--max-attempts':
        config.retry.maxAttempts = positiveInt(value, config.retry.maxAttempts);
        break;
      case '--page-delay':
        config.throttle.pageDelayMs = nonNegativeInt(value, config.throttle.pageDelayMs);
        break;
      case '--page-jitter':
        config.throttle.pageDelayJitterMs = nonNegativeInt(value, config.throttle.pageDelayJitterMs);
        break;
      case '--timeout':
        config.timeoutMs = positiveInt(value, config.timeoutMs);
        break;
      case '--max-pages':
        config.maxPages = positiveInt(value, config.maxPages);
        break;
      case '--max-failed-pages':
        config.maxFailedPages = positiveInt(value, config.maxFailedPages);
        break;
      case '--on-exhausted':
        config.onExhausted = parseExhaustionPolicy(value);
        break;
      case '--synthetic-count':
        config.syntheticCount = positiveInt(value, config.syntheticCount);
        break;
      case '--output':
        config.outputFile = value;
        break;
      case '--markers':
        config.markersFile = value;
        break;
      case '--log-dir':
        config.logDir = value;
        break;
    }
    i += 1;
  }

  return config;
}
