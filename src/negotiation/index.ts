import { createNegotiator } from './negotiator.js';
import { charsetStrategy, encodingStrategy, languageStrategy, mediaTypeStrategy, STRATEGIES } from './strategies.js';
import type { NegotiationKind, Negotiator, NegotiatorOptions } from './types.js';

export { createNegotiator, rankAvailable } from './negotiator.js';
export { DEFAULT_MAX_HEADER_LENGTH, parseHeaderTerms } from './headerTermParser.js';
export * from './quality.js';
export * from './strategies.js';
export type {
  AvailabilityMap,
  HeaderParseOptions,
  NegotiatedCandidate,
  NegotiationSelection,
  NegotiationKind,
  NegotiationStrategy,
  Negotiator,
  NegotiatorOptions,
  RankedCandidate,
  Term
} from './types.js';
export { InvalidAvailabilityError, MalformedHeaderError, NegotiationError, NotAcceptableError } from '../errors.js';

export const charsetNegotiator = createNegotiator(charsetStrategy);
export const encodingNegotiator = createNegotiator(encodingStrategy);
export const languageNegotiator = createNegotiator(languageStrategy);
export const mediaTypeNegotiator = createNegotiator(mediaTypeStrategy);

export function negotiatorFor(kind: NegotiationKind, options: NegotiatorOptions = {}): Negotiator {
  return createNegotiator(STRATEGIES[kind], options);
}
