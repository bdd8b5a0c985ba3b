/**
 * Quality values are kept as integers so that ties compare exactly.
 *
 * A `Quality` is a qvalue in thousandths (0..1000), which is all the precision
 * the Accept-* grammar allows. A `NegotiatedQuality` is the product of two of
 * them, in millionths.
 */
export type Quality = number;
export type NegotiatedQuality = number;

export const QUALITY_SCALE = 1000;
export const MAX_QUALITY: Quality = QUALITY_SCALE;
export const MIN_NONZERO_QUALITY: Quality = 1;

const QVALUE_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a header qvalue such as `0.5`, `.25` or `1.000`.
 *
 * Values above 1 are clamped to 1 and digits past the third decimal are rounded
 * half up. Returns `undefined` when the text is not a plain decimal.
 */
export function parseQualityValue(raw: string): Quality | undefined {
  const trimmed = raw.trim();
  if (!QVALUE_PATTERN.test(trimmed)) {
    return undefined;
  }

  const [intPart = '', fracPart = ''] = trimmed.split('.', 2);
  if (!/^0*$/.test(intPart)) {
    return MAX_QUALITY;
  }

  let thousandths = Number(`${fracPart}000`.slice(0, 3));
  const roundingDigit = fracPart.charAt(3);
  if (roundingDigit >= '5') {
    thousandths += 1;
  }
  return Math.min(MAX_QUALITY, thousandths);
}

/**
 * Availability weights follow the qvalue grammar: at most three decimals, so
 * they convert to thousandths without loss. The tolerance absorbs binary
 * representation error such as `0.29 * 1000 === 290.00000000000006`.
 */
export function hasQualityPrecision(weight: number): boolean {
  const scaled = weight * QUALITY_SCALE;
  return Math.abs(scaled - Math.round(scaled)) < 1e-9;
}

export function weightToQuality(weight: number): Quality {
  return Math.round(weight * QUALITY_SCALE);
}

export function isValidWeight(weight: unknown): weight is number {
  if (typeof weight !== 'number' || !Number.isFinite(weight)) {
    return false;
  }
  if (weight <= 0 || weight > 1) {
    return false;
  }
  return hasQualityPrecision(weight);
}

/** Weight times term quality; multiplication is the pinned combining rule. */
export function combineQuality(weight: Quality, termQuality: Quality): NegotiatedQuality {
  return weight * termQuality;
}

export function qualityToDecimal(quality: Quality): number {
  return quality / QUALITY_SCALE;
}

export function negotiatedQualityToDecimal(quality: NegotiatedQuality): number {
  return quality / (QUALITY_SCALE * QUALITY_SCALE);
}
