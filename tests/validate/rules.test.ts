import { beforeAll, describe, expect, it } from 'vitest';
import { loadQualityMarkers } from '../../src/validate/markers.js';
import type { QualityMarkers } from '../../src/validate/markers.js';
import {
  findOrganizationMarker,
  findPlaceholderMarker,
  isValidEmailFormat,
  isValidProfileUrl,
  normalizeEmail,
} from '../../src/validate/rules.js';

const urlRule = { host: 'www.twine.net', pathPrefix: '/profile/' };

let markers: QualityMarkers;

beforeAll(async () => {
  markers = await loadQualityMarkers('data/quality_markers.json');
});

describe('email format', () => {
  it.each([
    'jane@gmail.com',
    'jane.doe+reels@outlook.co.uk',
    "o'brien@icloud.com",
    'ava_okafor-99@proton.me',
  ])('accepts %s', (email) => {
    expect(isValidEmailFormat(email)).toBe(true);
  });

  it.each([
    '',
    'jane',
    'jane@gmail',
    '@gmail.com',
    '.jane@gmail.com',
    'jane..doe@gmail.com',
    'jane@@gmail.com',
    '"jane doe"@gmail.com',
    'jane@[192.168.1.10]',
    'jane@-gmail.com',
    'jane@gmail.c',
    'jane doe@gmail.com',
  ])('rejects %j', (email) => {
    expect(isValidEmailFormat(email)).toBe(false);
  });

  it('enforces the local part length limit', () => {
    expect(isValidEmailFormat(`${'a'.repeat(64)}@gmail.com`)).toBe(true);
    expect(isValidEmailFormat(`${'a'.repeat(65)}@gmail.com`)).toBe(false);
  });

  it('normalizes by trimming and lowercasing', () => {
    expect(normalizeEmail('  Jane.Doe@Gmail.COM ')).toBe('jane.doe@gmail.com');
  });
});

describe('placeholder detection', () => {
  it('flags listed placeholder domains and their subdomains', () => {
    expect(findPlaceholderMarker('jane@example.com', 'Jane Doe', markers.PlaceholderData)).toBe('domain example.com');
    expect(findPlaceholderMarker('jane@mail.example.org', 'Jane Doe', markers.PlaceholderData)).toBe(
      'domain example.org',
    );
  });

  it('flags reserved top-level domains', () => {
    expect(findPlaceholderMarker('jane@studio.test', 'Jane Doe', markers.PlaceholderData)).toBe('reserved TLD .test');
  });

  it('flags marker tokens in the local part and domain labels', () => {
    expect(findPlaceholderMarker('jane.test@gmail.com', 'Jane Doe', markers.PlaceholderData)).toBe(
      'local part contains "test"',
    );
    expect(findPlaceholderMarker('jane@demo-mail.io', 'Jane Doe', markers.PlaceholderData)).toBe(
      'domain label contains "demo"',
    );
  });

  it.each([
    ['qatest@gmail.com', 'local part contains "test"'],
    ['testuser@gmail.com', 'local part contains "test"'],
    ['placeholder1@gmail.com', 'local part contains "placeholder"'],
    ['latest@samplers.io', 'local part contains "test"'],
    ['contestant@gmail.com', 'local part contains "test"'],
    ['jane@testmail.io', 'domain label contains "test"'],
    ['jane@fakeinbox.co', 'domain label contains "fake"'],
  ])('flags %s where a marker sits inside a word', (email, expected) => {
    expect(findPlaceholderMarker(email, 'Jane Doe', markers.PlaceholderData)).toBe(expected);
  });

  it('flags placeholder names', () => {
    expect(findPlaceholderMarker('info@acme.co', '  Sample   Name ', markers.PlaceholderData)).toBe(
      'name "sample name"',
    );
  });

  it('passes ordinary addresses', () => {
    expect(findPlaceholderMarker('jane@gmail.com', 'Jane Doe', markers.PlaceholderData)).toBeNull();
  });
});

describe('organization filtering', () => {
  it.each([
    ['Acme Studio', 'name token "studio"'],
    ['Bright Media LLC', 'name token "media"'],
    ['Reel Makers Inc.', 'name token "inc"'],
    ['The Brightside', 'leading article "The"'],
    ['J', 'name missing or too short'],
    ['', 'name missing or too short'],
  ])('flags %j', (name, expected) => {
    expect(findOrganizationMarker(name, markers.NotAnIndividual)).toBe(expected);
  });

  it.each(['Jane Doe', 'Theo Walsh', 'Mediana Ruiz', 'the weekend crew'])('passes %j', (name) => {
    expect(findOrganizationMarker(name, markers.NotAnIndividual)).toBeNull();
  });
});

describe('profile url', () => {
  it.each(['https://www.twine.net/profile/jane', 'https://WWW.Twine.net/profile/jane-doe-12'])('accepts %s', (url) => {
    expect(isValidProfileUrl(url, urlRule)).toBe(true);
  });

  it.each([
    'https://www.twine.net/jane',
    'http://www.twine.net/profile/jane',
    'https://twine.net/profile/jane',
    'https://www.twine.net/profile/',
    '/profile/jane',
    '',
  ])('rejects %j', (url) => {
    expect(isValidProfileUrl(url, urlRule)).toBe(false);
  });
});
