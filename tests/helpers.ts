import type { BrowserSession, LoadPageOptions } from '../src/browser/session.js';
import { FetchFailure } from '../src/errors.js';
import type { LoadedPage } from '../src/types.js';
import type { RunLifecycleLogger } from '../src/pipeline/run.js';

export type ScriptedResponse = LoadedPage | FetchFailure;

/**
 * Replays scripted responses per URL. Earlier entries are consumed; the last one repeats.
 * Unscripted URLs fail with FetchError.
 */
export class FakeBrowserSession implements BrowserSession {
  readonly calls: string[] = [];
  readonly options: LoadPageOptions[] = [];
  closed = false;

  constructor(private readonly script: Map<string, ScriptedResponse[]>) {}

  async loadPage(url: string, options: LoadPageOptions): Promise<LoadedPage> {
    this.calls.push(url);
    this.options.push(options);

    const queue = this.script.get(url);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (next === undefined) {
      throw new FetchFailure('FetchError', url, 'no scripted response');
    }
    if (next instanceof FetchFailure) {
      throw next;
    }
    return next;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class MemoryLogger implements RunLifecycleLogger {
  readonly lines: string[] = [];

  async init(): Promise<void> {
    this.lines.push('init');
  }

  async info(message: string): Promise<void> {
    this.lines.push(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    this.lines.push(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    this.lines.push(`[ERROR] ${message}`);
  }

  async close(): Promise<void> {
    this.lines.push('close');
  }
}

export function page(url: string, html: string): LoadedPage {
  return { url, html };
}

export function timeout(url: string): FetchFailure {
  return new FetchFailure('FetchTimeout', url, 'Timeout 1000ms exceeded');
}

export function listingHtml(hrefs: string[]): string {
  const cards = hrefs.map((href) => `<div class="card"><a href="${href}">View profile</a></div>`).join('');
  return `<html><body><main>${cards}</main></body></html>`;
}

export function profileHtml(name: string, email?: string): string {
  const contact = email ? `<a href="mailto:${email}">Contact</a>` : '';
  return `<html><body><h1 class="profile-name">${name}</h1>${contact}</body></html>`;
}

export const noWait = async (): Promise<void> => {};
