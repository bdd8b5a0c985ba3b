import { MalformedHeaderError } from '../errors.js';
import { MAX_QUALITY, parseQualityValue } from './quality.js';
import type { HeaderParseOptions, Term } from './types.js';

export const DEFAULT_MAX_HEADER_LENGTH = 4096;

function readQualityParam(params: string[], segment: string): { quality: number; explicit: boolean } {
  for (const param of params) {
    const eq = param.indexOf('=');
    const name = (eq < 0 ? param : param.slice(0, eq)).trim().toLowerCase();
    if (name !== 'q') {
      continue;
    }

    const quality = eq < 0 ? undefined : parseQualityValue(param.slice(eq + 1));
    if (quality === undefined) {
      throw new MalformedHeaderError(`Invalid quality value in header segment "${segment}"`, {
        segment
      });
    }
    // Anything after q is an accept-extension, not a media type parameter.
    return { quality, explicit: true };
  }

  return { quality: MAX_QUALITY, explicit: false };
}

/**
 * Splits a raw Accept-* header into terms in declaration order.
 *
 * Empty list elements are skipped, so positions stay dense. Parameters other
 * than `q` are dropped.
 */
export function parseHeaderTerms(rawHeader: string | undefined, options: HeaderParseOptions = {}): Term[] {
  const raw = (rawHeader ?? '').trim();
  if (!raw) {
    return [];
  }

  const maxLength = options.maxLength ?? DEFAULT_MAX_HEADER_LENGTH;
  if (raw.length > maxLength) {
    throw new MalformedHeaderError(`Header exceeds ${maxLength} characters`, {
      length: raw.length,
      maxLength
    });
  }

  const terms: Term[] = [];
  for (const entry of raw.split(',')) {
    const segment = entry.trim();
    if (!segment) {
      continue;
    }

    const [valuePart = '', ...params] = segment.split(';');
    const value = valuePart.trim();
    if (!value) {
      throw new MalformedHeaderError(`Missing value in header segment "${segment}"`, { segment });
    }

    const { quality, explicit } = readQualityParam(params, segment);
    terms.push({
      position: terms.length,
      value,
      quality,
      hasExplicitQuality: explicit
    });
  }

  return terms;
}
