import type { BrowserSession } from '../browser/session.js';
import type { RunConfig } from '../config.js';
import { FetchFailure, RetryExhaustedError } from '../errors.js';
import { extractProfileLinks } from '../extract/profile.js';
import type { FetchFailureKind, LoadedPage, RawProfileFragment, RoleSource } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { listingPageUrl } from '../utils/url.js';
import { withRetry } from './retry.js';
import type { SyntheticProfileFactory } from './synthetic.js';
import type { PageThrottle } from './throttle.js';

export type ExhaustionHandling =
  | { policy: 'skip' }
  | { policy: 'synthesize'; factory: SyntheticProfileFactory; count: number };

export type FetchSettings = Pick<
  RunConfig,
  'targetPerRole' | 'retry' | 'timeoutMs' | 'scrollPasses' | 'maxPages' | 'maxFailedPages' | 'profileUrl'
>;

export interface FetchContext {
  session: BrowserSession;
  throttle: PageThrottle;
  logger: Logger;
  settings: FetchSettings;
  exhaustion: ExhaustionHandling;
  stats: FetchStats;
  backoffWait?: (ms: number) => Promise<void>;
}

export class FetchStats {
  listingPagesAttempted = 0;
  listingPagesLoaded = 0;
  listingPagesFailed = 0;
  loadAttempts = 0;
  profilePagesFailed = 0;
  syntheticFragments = 0;

  // Failed attempts, including ones that were retried.
  readonly attemptFailures: Record<FetchFailureKind, number> = { FetchTimeout: 0, FetchError: 0 };

  // Listing pages given up on, by the kind of their last failure.
  readonly exhaustedPages: Record<FetchFailureKind, number> = { FetchTimeout: 0, FetchError: 0 };
}

function listingReadySelector(pathPrefix: string): string {
  return `a[href*='${pathPrefix}'], div[class*='card']`;
}

async function loadListingPage(url: string, ctx: FetchContext): Promise<LoadedPage> {
  const { settings, logger, stats } = ctx;

  return withRetry(
    async () => {
      stats.loadAttempts += 1;
      const page = await ctx.throttle.schedule(() =>
        ctx.session.loadPage(url, {
          waitForSelector: listingReadySelector(settings.profileUrl.pathPrefix),
          timeoutMs: settings.timeoutMs,
          scrollPasses: settings.scrollPasses,
        }),
      );
      if (!page.html.trim()) {
        throw new FetchFailure('FetchError', url, 'empty document');
      }
      return page;
    },
    settings.retry,
    {
      wait: ctx.backoffWait,
      onFailure: async (failure, attempt, willRetry) => {
        stats.attemptFailures[failure.kind] += 1;
        await logger.warn(
          `${failure.kind} on ${url} (attempt ${attempt + 1}/${settings.retry.maxAttempts})${
            willRetry ? ', retrying' : ''
          }`,
        );
      },
    },
  );
}

async function loadProfileHtml(url: string, ctx: FetchContext): Promise<string> {
  try {
    const page = await ctx.throttle.schedule(() =>
      ctx.session.loadPage(url, { waitForSelector: 'body', timeoutMs: ctx.settings.timeoutMs }),
    );
    return page.html;
  } catch (error) {
    if (!(error instanceof FetchFailure)) {
      throw error;
    }
    ctx.stats.profilePagesFailed += 1;
    await ctx.logger.warn(`Profile page skipped: ${error.message}`);
    return '';
  }
}

/**
 * Walks a role's listing pages and yields one fragment per profile, loading each profile
 * page before yielding so the consumer handles records one at a time.
 */
export async function* fetchRoleProfiles(
  source: RoleSource,
  ctx: FetchContext,
): AsyncGenerator<RawProfileFragment, void, undefined> {
  const { settings, logger, stats } = ctx;
  const target = settings.targetPerRole;
  let yielded = 0;
  let failedPages = 0;
  // Sites that ignore ?page=N serve page 1 again; its profiles are not loaded twice.
  const visited = new Set<string>();

  await logger.info(`Starting ${source.roleType} listings at ${source.listingUrl} (target ${target})`);

  for (let page = 1; page <= settings.maxPages && yielded < target; page += 1) {
    const pageUrl = listingPageUrl(source.listingUrl, page);
    stats.listingPagesAttempted += 1;

    let listing: LoadedPage;
    try {
      listing = await loadListingPage(pageUrl, ctx);
    } catch (error) {
      if (!(error instanceof RetryExhaustedError)) {
        throw error;
      }
      failedPages += 1;
      stats.listingPagesFailed += 1;
      stats.exhaustedPages[error.lastFailure.kind] += 1;
      await logger.warn(
        `${source.roleType} page ${page} failed after ${error.attempts} attempt(s) with ${error.lastFailure.kind}`,
      );

      if (ctx.exhaustion.policy === 'synthesize') {
        const fragments = ctx.exhaustion.factory.create(
          source.roleType,
          Math.min(ctx.exhaustion.count, target - yielded),
        );
        stats.syntheticFragments += fragments.length;
        await logger.warn(`Synthesizing ${fragments.length} placeholder profile(s) for ${source.roleType}`);
        for (const fragment of fragments) {
          yielded += 1;
          yield fragment;
        }
      }

      if (failedPages >= settings.maxFailedPages) {
        await logger.warn(`Stopping ${source.roleType} after ${failedPages} failed listing page(s)`);
        break;
      }
      continue;
    }

    stats.listingPagesLoaded += 1;
    const links = extractProfileLinks(listing.html, listing.url, settings.profileUrl.pathPrefix)
      .filter((link) => !visited.has(link))
      .slice(0, target - yielded);
    if (links.length === 0) {
      await logger.info(`No more ${source.roleType} results on page ${page}`);
      break;
    }

    await logger.info(`Found ${links.length} ${source.roleType} profile(s) on page ${page}`);
    for (const link of links) {
      visited.add(link);
      const html = await loadProfileHtml(link, ctx);
      yielded += 1;
      yield { kind: 'html', roleType: source.roleType, profileUrl: link, html };
    }
    await logger.info(`Collected ${yielded}/${target} ${source.roleType} profile(s)`);
  }
}
