import type { ProfileUrlRule } from '../config.js';
import { normalizeWhitespace, wordTokens } from '../utils/text.js';
import { parseAbsoluteUrl } from '../utils/url.js';
import type { OrganizationMarkers, PlaceholderMarkers } from './markers.js';

// RFC 5322 dot-atom on both sides. Quoted local parts and IP-literal domains are not accepted.
const ATEXT = "[a-z0-9!#$%&'*+/=?^_`{|}~-]";
const LOCAL_PART = `${ATEXT}+(?:\\.${ATEXT}+)*`;
const DOMAIN_LABEL = '[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?';
const EMAIL_PATTERN = new RegExp(`^${LOCAL_PART}@(?:${DOMAIN_LABEL}\\.)+[a-z]{2,63}$`, 'i');

const MAX_LOCAL_PART_LENGTH = 64;
const MAX_ADDRESS_LENGTH = 254;

export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isValidEmailFormat(email: string): boolean {
  if (!email || email.length > MAX_ADDRESS_LENGTH) {
    return false;
  }
  const at = email.lastIndexOf('@');
  if (at < 1 || at > MAX_LOCAL_PART_LENGTH) {
    return false;
  }
  return EMAIL_PATTERN.test(email);
}

function splitEmail(email: string): { local: string; domain: string } {
  const at = email.lastIndexOf('@');
  return { local: email.slice(0, at), domain: email.slice(at + 1) };
}

/**
 * Returns the matched marker, or null when the address and name look real. Expects a normalized email.
 * Tokens match anywhere inside the local part or a host label, so real addresses such as
 * `contestant@gmail.com` are rejected too; that false positive is an accepted limitation.
 */
export function findPlaceholderMarker(
  email: string,
  name: string,
  markers: PlaceholderMarkers,
): string | null {
  const { local, domain } = splitEmail(email);

  const listedDomain = markers.domains.find((entry) => domain === entry || domain.endsWith(`.${entry}`));
  if (listedDomain) {
    return `domain ${listedDomain}`;
  }

  const labels = domain.split('.');
  const tld = labels[labels.length - 1];
  if (markers.reservedTlds.includes(tld)) {
    return `reserved TLD .${tld}`;
  }

  const localToken = markers.tokens.find((token) => local.includes(token));
  if (localToken) {
    return `local part contains "${localToken}"`;
  }

  const hostLabels = labels.slice(0, -1);
  const domainToken = markers.tokens.find((token) => hostLabels.some((label) => label.includes(token)));
  if (domainToken) {
    return `domain label contains "${domainToken}"`;
  }

  const normalizedName = normalizeWhitespace(name).toLowerCase();
  if (markers.names.includes(normalizedName)) {
    return `name "${normalizedName}"`;
  }

  return null;
}

/**
 * Heuristic: flags names that read like a business or brand rather than a person.
 * Misses brands without a marker word and can reject people whose surname is one
 * (e.g. "Media"); both are accepted limitations.
 */
export function findOrganizationMarker(name: string, markers: OrganizationMarkers): string | null {
  const normalized = normalizeWhitespace(name);
  if (normalized.length < 2) {
    return 'name missing or too short';
  }

  const token = wordTokens(normalized).find((word) => markers.nameTokens.includes(word));
  if (token) {
    return `name token "${token}"`;
  }

  const [first, second] = normalized.split(' ');
  if (second && markers.leadingArticles.includes(first.toLowerCase()) && /^\p{Lu}/u.test(second)) {
    return `leading article "${first}"`;
  }

  return null;
}

export function isValidProfileUrl(rawUrl: string, rule: ProfileUrlRule): boolean {
  const url = parseAbsoluteUrl(rawUrl.trim());
  if (!url || url.protocol !== 'https:') {
    return false;
  }
  if (url.hostname !== rule.host.toLowerCase()) {
    return false;
  }
  if (!url.pathname.startsWith(rule.pathPrefix)) {
    return false;
  }
  const slug = url.pathname.slice(rule.pathPrefix.length).replace(/\/+$/, '');
  return slug.length > 0;
}
