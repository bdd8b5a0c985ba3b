import { InvalidAvailabilityError, NotAcceptableError } from '../errors.js';
import { parseHeaderTerms } from './headerTermParser.js';
import { combineQuality, isValidWeight, MAX_QUALITY, weightToQuality } from './quality.js';
import type {
  AvailabilityMap,
  NegotiatedCandidate,
  NegotiationSelection,
  NegotiationStrategy,
  Negotiator,
  NegotiatorOptions,
  RankedCandidate,
  Term
} from './types.js';

function isMapInput(available: AvailabilityMap): available is ReadonlyMap<string, number> {
  return available instanceof Map;
}

function availabilityEntries(available: AvailabilityMap): Array<[unknown, unknown]> {
  if (isMapInput(available)) {
    return Array.from(available.entries());
  }
  return Object.entries(available);
}

/**
 * Checks every weight and returns the candidates in descending weight order.
 * Array#sort is stable, so equal weights keep insertion order.
 */
export function rankAvailable(strategy: NegotiationStrategy, available: AvailabilityMap): RankedCandidate[] {
  const entries = availabilityEntries(available);
  if (entries.length === 0) {
    throw new InvalidAvailabilityError(`Availability map for ${strategy.headerName} must not be empty`);
  }

  const seen = new Map<string, string>();
  const candidates: RankedCandidate[] = [];
  for (const [id, weight] of entries) {
    if (typeof id !== 'string' || !id.trim()) {
      throw new InvalidAvailabilityError('Available identifiers must be non-empty strings', { id: String(id) });
    }
    if (!isValidWeight(weight)) {
      throw new InvalidAvailabilityError(
        `Invalid quality value for available ${strategy.label}: "${id}" => ${String(weight)} (expected a number in (0, 1] with at most 3 decimal places)`,
        {
          id,
          weight: String(weight)
        }
      );
    }

    const normalized = strategy.normalize(id.trim());
    const previous = seen.get(normalized);
    if (previous !== undefined) {
      throw new InvalidAvailabilityError(`Available ${strategy.label} "${previous}" and "${id}" are the same identifier`, {
        id,
        duplicateOf: previous
      });
    }
    seen.set(normalized, id);
    candidates.push({ id, normalized, weight: weightToQuality(weight) });
  }

  return candidates.sort((a, b) => b.weight - a.weight);
}

function findMatchingTerm(strategy: NegotiationStrategy, terms: readonly Term[], candidate: string): Term | undefined {
  let best: Term | undefined;
  let bestScore = -1;
  for (const term of terms) {
    const score = strategy.match(term, candidate);
    // Strictly greater: the first declared term wins among equally specific ones.
    if (score > bestScore) {
      best = term;
      bestScore = score;
    }
  }
  return best;
}

function matchCandidates(
  strategy: NegotiationStrategy,
  candidates: readonly RankedCandidate[],
  terms: readonly Term[]
): NegotiatedCandidate[] {
  const matched: NegotiatedCandidate[] = [];
  for (const candidate of candidates) {
    const term = findMatchingTerm(strategy, terms, candidate.normalized);
    if (!term) {
      continue;
    }
    matched.push({
      id: candidate.id,
      weight: candidate.weight,
      termQuality: term.quality,
      negotiatedQuality: combineQuality(candidate.weight, term.quality),
      position: term.position,
      hasExplicitQuality: term.hasExplicitQuality,
      matchedTerm: term.value
    });
  }
  return matched;
}

function sortByPreference(candidates: NegotiatedCandidate[]): NegotiatedCandidate[] {
  return candidates.sort((a, b) => b.negotiatedQuality - a.negotiatedQuality || a.position - b.position);
}

export function createNegotiator(strategy: NegotiationStrategy, options: NegotiatorOptions = {}): Negotiator {
  function parse(rawHeader: string | undefined): readonly Term[] {
    const header = strategy.normalize((rawHeader ?? '').trim());
    return strategy.coalesce(parseHeaderTerms(header, options));
  }

  function rankWith(rawHeader: string | undefined, ranked: RankedCandidate[]): NegotiatedCandidate[] {
    // No header means anything is acceptable, so the server's own preference wins.
    if (!rawHeader?.trim()) {
      return ranked.map((candidate, index) => ({
        id: candidate.id,
        weight: candidate.weight,
        termQuality: MAX_QUALITY,
        negotiatedQuality: combineQuality(candidate.weight, MAX_QUALITY),
        position: index,
        hasExplicitQuality: false
      }));
    }

    const matched = matchCandidates(strategy, ranked, parse(rawHeader));
    return sortByPreference(matched.filter((candidate) => candidate.negotiatedQuality > 0));
  }

  function select(rawHeader: string | undefined, available: AvailabilityMap): NegotiationSelection {
    const ranking = rankWith(rawHeader, rankAvailable(strategy, available));
    const [selected] = ranking;
    if (selected) {
      return { selected, ranking };
    }

    const header = (rawHeader ?? '').trim();
    const ids = availabilityEntries(available).map(([id]) => String(id));
    throw new NotAcceptableError(
      `No available ${strategy.label} match \`${strategy.headerName}: ${header}\`. Available set: [${ids.join('|')}]`,
      {
        headerName: strategy.headerName,
        header,
        available: ids
      }
    );
  }

  return {
    strategy,
    parse,
    select,

    rank(rawHeader, available) {
      return rankWith(rawHeader, rankAvailable(strategy, available));
    },

    negotiate(rawHeader, available) {
      return select(rawHeader, available).selected.id;
    }
  };
}
