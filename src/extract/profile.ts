import * as cheerio from 'cheerio';
import type { CandidateRecord, RawProfileFragment } from '../types.js';
import { normalizeWhitespace } from '../utils/text.js';
import { stripQueryAndHash, toAbsoluteUrl } from '../utils/url.js';

const NAME_HEADING_CLASS = /profile|name|title/i;
const NAME_BLOCK_CLASS = /name/i;
const EMAIL_IN_TEXT = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

export interface ProfileDetails {
  name: string;
  email: string;
}

export function extractProfileLinks(html: string, baseUrl: string, pathPrefix: string): string[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const out: string[] = [];

  $('a[href]').each((_, anchor) => {
    const href = normalizeWhitespace($(anchor).attr('href') ?? '');
    if (!href.includes(pathPrefix)) {
      return;
    }
    const absolute = stripQueryAndHash(toAbsoluteUrl(href, baseUrl));
    if (!absolute.startsWith('http') || seen.has(absolute)) {
      return;
    }
    seen.add(absolute);
    out.push(absolute);
  });

  return out;
}

function decodeMailto(href: string): string {
  const address = href.replace(/^mailto:/i, '').split('?')[0];
  try {
    return decodeURIComponent(address).trim();
  } catch {
    return address.trim();
  }
}

export function extractProfileDetails(html: string): ProfileDetails {
  if (!html) {
    return { name: '', email: '' };
  }

  const $ = cheerio.load(html);

  const headings = $('h1').toArray();
  const classedHeading = headings.find((heading) => NAME_HEADING_CLASS.test($(heading).attr('class') ?? ''));
  const nameBlock = $('div')
    .toArray()
    .find((block) => NAME_BLOCK_CLASS.test($(block).attr('class') ?? ''));
  const nameElement = classedHeading ?? headings[0] ?? nameBlock;
  const name = nameElement ? normalizeWhitespace($(nameElement).text()) : '';

  let email = '';
  const mailto = $('a[href^="mailto:"]').first().attr('href');
  if (mailto) {
    email = decodeMailto(mailto);
  } else {
    email = normalizeWhitespace($('body').text()).match(EMAIL_IN_TEXT)?.[0] ?? '';
  }

  return { name, email };
}

export function toCandidate(fragment: RawProfileFragment): CandidateRecord {
  if (fragment.kind === 'synthetic') {
    return {
      name: fragment.name,
      email: fragment.email,
      profile_link: fragment.profileUrl,
      role_type: fragment.roleType,
      synthetic: true,
    };
  }

  const details = extractProfileDetails(fragment.html);
  return {
    name: details.name,
    email: details.email,
    profile_link: fragment.profileUrl,
    role_type: fragment.roleType,
    synthetic: false,
  };
}
