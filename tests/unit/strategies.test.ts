import { describe, expect, test } from 'vitest';

import { NotAcceptableError } from '../../src/errors.js';
import { encodingNegotiator, languageNegotiator, mediaTypeNegotiator } from '../../src/negotiation/index.js';

describe('encodingNegotiator', () => {
  test('prefers an accepted coding over implicit identity', () => {
    expect(encodingNegotiator.negotiate('gzip;q=0.8', { gzip: 1, identity: 1 })).toBe('gzip');
  });

  test('falls back to identity when nothing else is accepted', () => {
    expect(encodingNegotiator.negotiate('br', { identity: 1, gzip: 0.5 })).toBe('identity');
  });

  test('refuses identity when the header rejects it explicitly', () => {
    expect(() => encodingNegotiator.negotiate('identity;q=0', { identity: 1 })).toThrow(NotAcceptableError);
    expect(() => encodingNegotiator.negotiate('*;q=0', { identity: 1 })).toThrow(
      'No available encodings match `Accept-Encoding: *;q=0`. Available set: [identity]'
    );
  });

  test('ranks implicit identity at the lowest nonzero quality', () => {
    expect(encodingNegotiator.parse('gzip')).toEqual([
      { position: 0, value: 'gzip', quality: 1000, hasExplicitQuality: false },
      { position: 1, value: 'identity', quality: 1, hasExplicitQuality: false }
    ]);
  });
});

describe('languageNegotiator', () => {
  test('matches a language range against longer tags', () => {
    expect(languageNegotiator.negotiate('en', { 'en-US': 1, fr: 1 })).toBe('en-US');
  });

  test('uses the most specific matching range', () => {
    expect(languageNegotiator.negotiate('en-gb, en;q=0.8', { 'en-US': 1, 'en-GB': 1 })).toBe('en-GB');
    expect(languageNegotiator.negotiate('en-gb;q=0, en', { 'en-GB': 1, en: 0.5 })).toBe('en');
  });

  test('only matches whole subtags', () => {
    expect(() => languageNegotiator.negotiate('e', { en: 1 })).toThrow(NotAcceptableError);
  });

  test('breaks wildcard ties by declaration order', () => {
    expect(languageNegotiator.negotiate('de, *;q=0.5', { fr: 1, de: 0.5 })).toBe('de');
  });
});

describe('mediaTypeNegotiator', () => {
  test('weighs type wildcards against exact types', () => {
    expect(
      mediaTypeNegotiator.negotiate('text/*;q=0.5, application/json', {
        'text/html': 1,
        'application/json': 0.8
      })
    ).toBe('application/json');
  });

  test('ignores media type parameters and compares case-insensitively', () => {
    expect(
      mediaTypeNegotiator.negotiate('text/html;level=1, */*;q=0.1', {
        'application/xml': 1,
        'TEXT/HTML': 0.5
      })
    ).toBe('TEXT/HTML');
  });

  test('an exact q=0 beats a broader wildcard for the same type', () => {
    expect(mediaTypeNegotiator.negotiate('text/plain;q=0, text/*', { 'text/plain': 1, 'text/csv': 0.5 })).toBe(
      'text/csv'
    );
  });

  test('fails when no media range matches', () => {
    expect(() => mediaTypeNegotiator.negotiate('image/png', { 'text/html': 1 })).toThrow(
      'No available media types match `Accept: image/png`. Available set: [text/html]'
    );
  });
});
