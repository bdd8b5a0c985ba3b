import { describe, expect, test } from 'vitest';

import { MalformedHeaderError } from '../../src/errors.js';
import { parseHeaderTerms } from '../../src/negotiation/headerTermParser.js';

describe('parseHeaderTerms', () => {
  test('returns no terms for an empty or absent header', () => {
    expect(parseHeaderTerms('')).toEqual([]);
    expect(parseHeaderTerms('   ')).toEqual([]);
    expect(parseHeaderTerms(undefined)).toEqual([]);
  });

  test('keeps declaration order and marks explicit qualities', () => {
    expect(parseHeaderTerms('utf-8, iso-8859-5;q=0.5, *;q=0.2')).toEqual([
      { position: 0, value: 'utf-8', quality: 1000, hasExplicitQuality: false },
      { position: 1, value: 'iso-8859-5', quality: 500, hasExplicitQuality: true },
      { position: 2, value: '*', quality: 200, hasExplicitQuality: true }
    ]);
  });

  test('does not reorder terms by quality', () => {
    const terms = parseHeaderTerms('a;q=0.1, b');
    expect(terms.map((term) => term.value)).toEqual(['a', 'b']);
    expect(terms.map((term) => term.position)).toEqual([0, 1]);
  });

  test('tolerates whitespace and an upper-case q parameter', () => {
    expect(parseHeaderTerms(' utf-8 ; q = 0.3 , latin1;Q=0.4')).toEqual([
      { position: 0, value: 'utf-8', quality: 300, hasExplicitQuality: true },
      { position: 1, value: 'latin1', quality: 400, hasExplicitQuality: true }
    ]);
  });

  test('skips empty list elements without leaving gaps in positions', () => {
    expect(parseHeaderTerms('utf-8,, ,iso-8859-1').map((term) => term.position)).toEqual([0, 1]);
  });

  test('ignores parameters other than q', () => {
    expect(parseHeaderTerms('text/html;level=1;q=0.7;ext=yes')).toEqual([
      { position: 0, value: 'text/html', quality: 700, hasExplicitQuality: true }
    ]);
  });

  test('clamps qualities above 1', () => {
    expect(parseHeaderTerms('utf-8;q=1.5')[0]).toEqual({
      position: 0,
      value: 'utf-8',
      quality: 1000,
      hasExplicitQuality: true
    });
  });

  test.each(['utf-8;q=abc', 'utf-8;q', 'utf-8;q=', 'utf-8;q=-1', ';q=0.5'])('rejects %s', (header) => {
    expect(() => parseHeaderTerms(header)).toThrow(MalformedHeaderError);
  });

  test('rejects headers longer than maxLength', () => {
    expect(() => parseHeaderTerms('utf-8, iso-8859-1', { maxLength: 8 })).toThrow('Header exceeds 8 characters');
  });
});
