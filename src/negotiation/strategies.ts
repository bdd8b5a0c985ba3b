import { MAX_QUALITY, MIN_NONZERO_QUALITY, type Quality } from './quality.js';
import type { NegotiationKind, NegotiationStrategy, Term } from './types.js';

const NO_MATCH = -1;

function lowercase(value: string): string {
  return value.toLowerCase();
}

function exactOrWildcard(wildcard: string) {
  return (term: Term, candidate: string): number => {
    if (term.value === candidate) {
      return 1;
    }
    return term.value === wildcard ? 0 : NO_MATCH;
  };
}

/**
 * Appends an implicit term for `value` unless the header already names it or
 * carries the wildcard.
 */
function withImplicitDefault(value: string, quality: Quality, wildcard: string) {
  return (terms: readonly Term[]): readonly Term[] => {
    if (terms.some((term) => term.value === value || term.value === wildcard)) {
      return terms;
    }
    return [
      ...terms,
      {
        position: terms.length,
        value,
        quality,
        hasExplicitQuality: false
      }
    ];
  };
}

/**
 * Accept-Charset. Charset tokens are case-insensitive and ISO-8859-1 is
 * acceptable at q=1 unless the header mentions it or uses "*".
 */
export const charsetStrategy: NegotiationStrategy = {
  kind: 'charset',
  headerName: 'Accept-Charset',
  label: 'charsets',
  normalize: lowercase,
  coalesce: withImplicitDefault('iso-8859-1', MAX_QUALITY, '*'),
  match: exactOrWildcard('*')
};

/**
 * Accept-Encoding. "identity" stays acceptable unless refused, but at the lowest
 * nonzero quality so any coding the client asked for beats it.
 */
export const encodingStrategy: NegotiationStrategy = {
  kind: 'encoding',
  headerName: 'Accept-Encoding',
  label: 'encodings',
  normalize: lowercase,
  coalesce: withImplicitDefault('identity', MIN_NONZERO_QUALITY, '*'),
  match: exactOrWildcard('*')
};

// A range matches a tag equal to it or one that continues it after a "-".
// Longer ranges are more specific.
export const languageStrategy: NegotiationStrategy = {
  kind: 'language',
  headerName: 'Accept-Language',
  label: 'languages',
  normalize: lowercase,
  coalesce: (terms) => terms,
  match(term, candidate) {
    if (term.value === '*') {
      return 0;
    }
    if (candidate === term.value || candidate.startsWith(`${term.value}-`)) {
      return term.value.split('-').length;
    }
    return NO_MATCH;
  }
};

export const mediaTypeStrategy: NegotiationStrategy = {
  kind: 'mediaType',
  headerName: 'Accept',
  label: 'media types',
  normalize: lowercase,
  coalesce: (terms) => terms,
  match(term, candidate) {
    if (term.value === candidate) {
      return 2;
    }
    if (term.value === '*/*') {
      return 0;
    }
    const [rangeType, rangeSubtype] = term.value.split('/', 2);
    const [candidateType] = candidate.split('/', 1);
    if (rangeSubtype === '*' && rangeType === candidateType) {
      return 1;
    }
    return NO_MATCH;
  }
};

export const STRATEGIES: Record<NegotiationKind, NegotiationStrategy> = {
  charset: charsetStrategy,
  encoding: encodingStrategy,
  language: languageStrategy,
  mediaType: mediaTypeStrategy
};
