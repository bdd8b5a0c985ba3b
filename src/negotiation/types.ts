import type { NegotiatedQuality, Quality } from './quality.js';

export type NegotiationKind = 'charset' | 'encoding' | 'language' | 'mediaType';

/** One preference declared in an Accept-* header. */
export interface Term {
  readonly position: number;
  readonly value: string;
  readonly quality: Quality;
  readonly hasExplicitQuality: boolean;
}

/** Identifier to intrinsic server-side weight in (0, 1]. */
export type AvailabilityMap = Readonly<Record<string, number>> | ReadonlyMap<string, number>;

export interface RankedCandidate {
  /** Key exactly as the caller supplied it. */
  readonly id: string;
  /** Key after the strategy's case normalization. */
  readonly normalized: string;
  readonly weight: Quality;
}

export interface NegotiatedCandidate {
  readonly id: string;
  readonly weight: Quality;
  readonly termQuality: Quality;
  readonly negotiatedQuality: NegotiatedQuality;
  readonly position: number;
  readonly hasExplicitQuality: boolean;
  /** Value of the header term that matched, `undefined` for the empty-header shortcut. */
  readonly matchedTerm?: string;
}

export interface NegotiationStrategy {
  readonly kind: NegotiationKind;
  readonly headerName: string;
  /** Plural noun used in diagnostics, e.g. "charsets". */
  readonly label: string;
  normalize(value: string): string;
  /** Appends implicit default terms; must not mutate its input. */
  coalesce(terms: readonly Term[]): readonly Term[];
  /**
   * Specificity of `term` for `candidate`: a negative number when the term does
   * not match, higher numbers for more specific matches.
   */
  match(term: Term, candidate: string): number;
}

export interface HeaderParseOptions {
  maxLength?: number;
}

export type NegotiatorOptions = HeaderParseOptions;

export interface NegotiationSelection {
  selected: NegotiatedCandidate;
  ranking: NegotiatedCandidate[];
}

export interface Negotiator {
  readonly strategy: NegotiationStrategy;
  negotiate(rawHeader: string | undefined, available: AvailabilityMap): string;
  /** Like `negotiate`, but returns the winner together with the full ranking. */
  select(rawHeader: string | undefined, available: AvailabilityMap): NegotiationSelection;
  rank(rawHeader: string | undefined, available: AvailabilityMap): NegotiatedCandidate[];
  parse(rawHeader: string | undefined): readonly Term[];
}
