import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';

export interface PlaceholderMarkers {
  tokens: string[];
  domains: string[];
  reservedTlds: string[];
  names: string[];
}

export interface OrganizationMarkers {
  nameTokens: string[];
  leadingArticles: string[];
}

/**
 * Lookup data for the heuristic stages, keyed by the rejection kind a match produces.
 * Lives in data/quality_markers.json so the lists can be audited and edited without code changes.
 */
export interface QualityMarkers {
  PlaceholderData: PlaceholderMarkers;
  NotAnIndividual: OrganizationMarkers;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(section: Record<string, unknown>, key: string, where: string): string[] {
  const value = section[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${where}.${key} must be an array of strings`);
  }
  return value.map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (!isRecord(value)) {
    throw new ConfigError(`quality markers: "${key}" section is missing`);
  }
  return value;
}

export function parseQualityMarkers(value: unknown): QualityMarkers {
  if (!isRecord(value)) {
    throw new ConfigError('quality markers must be a JSON object');
  }

  const placeholder = section(value, 'PlaceholderData');
  const organization = section(value, 'NotAnIndividual');

  return {
    PlaceholderData: {
      tokens: stringList(placeholder, 'tokens', 'PlaceholderData'),
      domains: stringList(placeholder, 'domains', 'PlaceholderData'),
      reservedTlds: stringList(placeholder, 'reservedTlds', 'PlaceholderData'),
      names: stringList(placeholder, 'names', 'PlaceholderData'),
    },
    NotAnIndividual: {
      nameTokens: stringList(organization, 'nameTokens', 'NotAnIndividual'),
      leadingArticles: stringList(organization, 'leadingArticles', 'NotAnIndividual'),
    },
  };
}

export async function loadQualityMarkers(filePath: string): Promise<QualityMarkers> {
  const content = await readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${String(error)}`);
  }
  return parseQualityMarkers(parsed);
}
