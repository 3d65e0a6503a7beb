import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import type { RoleType, SyntheticProfileFragment } from '../types.js';
import { slugify } from '../utils/text.js';

// RFC 2606 reserved names, so the placeholder stage always rejects synthetic rows.
export const SYNTHETIC_DOMAINS = ['example.com', 'example.net', 'example.org'] as const;

export interface FallbackNames {
  firstNames: string[];
  lastNames: string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function parseFallbackNames(value: unknown): FallbackNames {
  if (typeof value !== 'object' || value === null) {
    throw new ConfigError('fallback names must be a JSON object');
  }
  const firstNames: unknown = Reflect.get(value, 'firstNames');
  const lastNames: unknown = Reflect.get(value, 'lastNames');
  if (!isStringArray(firstNames) || !isStringArray(lastNames) || firstNames.length === 0 || lastNames.length === 0) {
    throw new ConfigError('fallback names need non-empty "firstNames" and "lastNames" string arrays');
  }
  return { firstNames, lastNames };
}

export async function loadFallbackNames(filePath: string): Promise<FallbackNames> {
  const content = await readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${String(error)}`);
  }
  return parseFallbackNames(parsed);
}

/**
 * Builds realistic-looking profiles for runs where the listing cannot be reached.
 * Output is deterministic and every email sits on a reserved domain.
 */
export class SyntheticProfileFactory {
  private sequence = 0;

  constructor(
    private readonly names: FallbackNames,
    private readonly profileBaseUrl: string,
  ) {}

  create(roleType: RoleType, count: number): SyntheticProfileFragment[] {
    const out: SyntheticProfileFragment[] = [];
    const roleSlug = slugify(roleType);

    for (let i = 0; i < count; i += 1) {
      const seq = this.sequence;
      this.sequence += 1;

      const first = this.names.firstNames[seq % this.names.firstNames.length];
      const last = this.names.lastNames[(seq * 7) % this.names.lastNames.length];
      const domain = SYNTHETIC_DOMAINS[seq % SYNTHETIC_DOMAINS.length];
      const handle = `${slugify(first)}.${slugify(last)}${seq + 1}`;

      out.push({
        kind: 'synthetic',
        roleType,
        name: `${first} ${last}`,
        email: `${handle}@${domain}`,
        profileUrl: `${this.profileBaseUrl}${slugify(`${first} ${last}`)}-${roleSlug}-${seq + 1}`,
      });
    }

    return out;
  }
}
