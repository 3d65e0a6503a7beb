import { URL } from 'node:url';

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

export function stripQueryAndHash(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    url.search = '';
    url.hash = '';
    url.hostname = url.hostname.toLowerCase();
    if (url.pathname !== '/' && url.pathname.endsWith('/')) {
      url.pathname = url.pathname.slice(0, -1);
    }
    return url.toString();
  } catch {
    return rawUrl.trim();
  }
}

export function listingPageUrl(listingUrl: string, page: number): string {
  if (page <= 1) {
    return listingUrl;
  }
  try {
    const url = new URL(listingUrl);
    url.searchParams.set('page', String(page));
    return url.toString();
  } catch {
    return `${listingUrl}?page=${page}`;
  }
}

export function parseAbsoluteUrl(rawUrl: string): URL | null {
  try {
    return new URL(rawUrl);
  } catch {
    return null;
  }
}
