import { join } from 'node:path';
import { launchBrowserSession } from '../browser/session.js';
import type { BrowserSession, LaunchOptions } from '../browser/session.js';
import type { RunConfig } from '../config.js';
import { toCandidate } from '../extract/profile.js';
import { FetchStats, fetchRoleProfiles } from '../fetch/listings.js';
import type { ExhaustionHandling } from '../fetch/listings.js';
import { SyntheticProfileFactory, loadFallbackNames } from '../fetch/synthetic.js';
import { PageThrottle } from '../fetch/throttle.js';
import { REJECTION_KINDS, ROLE_TYPES } from '../types.js';
import type { AcceptedRecord } from '../types.js';
import { writeProfilesCsv } from '../utils/csv.js';
import { RunLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { loadQualityMarkers } from '../validate/markers.js';
import { ProfileValidator } from '../validate/pipeline.js';
import { SeenEmailSet } from '../validate/seenEmails.js';
import { ValidationTally } from '../validate/tally.js';

export interface RunLifecycleLogger extends Logger {
  init(): Promise<void>;
  close(): Promise<void>;
}

export interface PipelineDependencies {
  launch?: (options: LaunchOptions) => Promise<BrowserSession>;
  logger?: RunLifecycleLogger;
  wait?: (ms: number) => Promise<void>;
}

export interface RunSummary {
  fragments: number;
  accepted: AcceptedRecord[];
  tally: ValidationTally;
  fetch: FetchStats;
  seenEmails: number;
  outputFile: string;
  elapsedSeconds: number;
}

function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

async function buildExhaustionHandling(config: RunConfig): Promise<ExhaustionHandling> {
  if (config.onExhausted === 'skip') {
    return { policy: 'skip' };
  }
  const names = await loadFallbackNames(config.fallbackNamesFile);
  const profileBaseUrl = `https://${config.profileUrl.host}${config.profileUrl.pathPrefix}`;
  return {
    policy: 'synthesize',
    factory: new SyntheticProfileFactory(names, profileBaseUrl),
    count: config.syntheticCount,
  };
}

async function logSummary(logger: Logger, summary: RunSummary): Promise<void> {
  const { tally, fetch } = summary;

  await logger.info('Validation results:');
  await logger.info(`  fragments_seen=${summary.fragments}`);
  await logger.info(`  accepted=${tally.accepted}`);
  await logger.info(`  rejected=${tally.rejectedTotal}`);
  for (const kind of REJECTION_KINDS) {
    await logger.info(`  rejected.${kind}=${tally.rejected[kind]}`);
  }
  for (const role of ROLE_TYPES) {
    await logger.info(`  accepted.${role}=${tally.acceptedByRole[role]}`);
  }

  await logger.info('Fetch results:');
  await logger.info(`  listing_pages_loaded=${fetch.listingPagesLoaded}/${fetch.listingPagesAttempted}`);
  await logger.info(`  listing_pages_failed=${fetch.listingPagesFailed}`);
  await logger.info(`  load_attempts=${fetch.loadAttempts}`);
  await logger.info(
    `  attempt_failures FetchTimeout=${fetch.attemptFailures.FetchTimeout} FetchError=${fetch.attemptFailures.FetchError}`,
  );
  await logger.info(
    `  exhausted_pages FetchTimeout=${fetch.exhaustedPages.FetchTimeout} FetchError=${fetch.exhaustedPages.FetchError}`,
  );
  await logger.info(`  profile_pages_failed=${fetch.profilePagesFailed}`);
  await logger.info(`  synthetic_fragments=${fetch.syntheticFragments}`);

  if (summary.accepted.length > 0) {
    await logger.info('Sample output:');
    for (const [index, record] of summary.accepted.slice(0, 3).entries()) {
      await logger.info(`  ${index + 1}. ${record.name} | ${record.email} | ${record.role_type}`);
    }
  }

  await logger.info(`Saved ${summary.accepted.length} profile(s) to ${summary.outputFile}`);
  await logger.info(`Elapsed ${summary.elapsedSeconds.toFixed(2)}s`);

  if (fetch.syntheticFragments > 0) {
    await logger.warn(
      `${fetch.syntheticFragments} synthetic placeholder profile(s) were generated after fetch failures; none are real data`,
    );
  }
}

export async function runScrapePipeline(
  config: RunConfig,
  deps: PipelineDependencies = {},
): Promise<RunSummary> {
  const startedAt = Date.now();
  const logger = deps.logger ?? new RunLogger(join(config.logDir, `scrape_run_${dateStamp()}.log`));
  const launch = deps.launch ?? launchBrowserSession;
  const wait = deps.wait ?? sleep;

  await logger.init();
  let session: BrowserSession | null = null;

  try {
    const markers = await loadQualityMarkers(config.markersFile);
    const exhaustion = await buildExhaustionHandling(config);

    await logger.info(
      `headless=${String(config.headless)} target_per_role=${config.targetPerRole} max_attempts=${config.retry.maxAttempts} on_exhausted=${config.onExhausted}`,
    );

    try {
      session = await launch({ headless: config.headless });
    } catch (error) {
      await logger.error(String(error));
      throw error;
    }

    const seen = new SeenEmailSet();
    const validator = new ProfileValidator(markers, config.profileUrl, seen);
    const tally = new ValidationTally();
    const stats = new FetchStats();
    const throttle = new PageThrottle(config.throttle, wait);
    const accepted: AcceptedRecord[] = [];
    let fragments = 0;

    for (const source of config.roles) {
      const profiles = fetchRoleProfiles(source, {
        session,
        throttle,
        logger,
        settings: config,
        exhaustion,
        stats,
        backoffWait: wait,
      });

      for await (const fragment of profiles) {
        fragments += 1;
        const candidate = toCandidate(fragment);
        const outcome = validator.validate(candidate);
        tally.record(outcome);

        if (outcome.status === 'accepted') {
          accepted.push(outcome.record);
        } else {
          await logger.info(`Rejected ${candidate.profile_link || '(no link)'}: ${outcome.reason} (${outcome.detail})`);
        }
      }
    }

    await writeProfilesCsv(config.outputFile, accepted);

    const summary: RunSummary = {
      fragments,
      accepted,
      tally,
      fetch: stats,
      seenEmails: seen.size,
      outputFile: config.outputFile,
      elapsedSeconds: (Date.now() - startedAt) / 1000,
    };
    await logSummary(logger, summary);
    return summary;
  } finally {
    if (session) {
      await session.close();
    }
    await logger.close();
  }
}
