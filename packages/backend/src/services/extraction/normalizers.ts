import { format, isValid, parse } from 'date-fns';
import { FieldType, NormalizerId } from '../../types/template.types';
import { compactWhitespace } from '../../utils/text.utils';

export type NormalizationResult =
  | { ok: true; value: string }
  | { ok: false; reason: string };

const MONTH_NAMES =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

// Tried in order; the first fragment that parses wins
const DATE_FRAGMENTS: RegExp[] = [
  new RegExp(`\\b(?:${MONTH_NAMES})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`, 'i'),
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?(?:${MONTH_NAMES})\\.?,?\\s+\\d{4}\\b`, 'i'),
  /\b\d{4}-\d{2}-\d{2}\b/,
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/,
];

const DATE_FORMATS = [
  'MMMM d, yyyy',
  'MMMM d yyyy',
  'MMM d, yyyy',
  'MMM d yyyy',
  'd MMMM, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
  'yyyy-MM-dd',
  'M/d/yyyy',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

const CURRENCY_PATTERN = /(\$)?\s*((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)/;

export function normalizeText(value: string): NormalizationResult {
  const cleaned = compactWhitespace(value);
  return cleaned ? { ok: true, value: cleaned } : { ok: false, reason: 'empty_text' };
}

export function normalizeDate(value: string): NormalizationResult {
  for (const fragmentPattern of DATE_FRAGMENTS) {
    const fragment = value.match(fragmentPattern);
    if (!fragment) continue;

    const cleaned = compactWhitespace(fragment[0])
      .replace(/(\d)(st|nd|rd|th)\b/gi, '$1')
      .replace(/\bday of\s+/i, '')
      .replace(/\b([A-Za-z]{3,})\./g, '$1')
      .replace(/\bSept\b/i, 'Sep');

    for (const dateFormat of DATE_FORMATS) {
      const parsed = parse(cleaned, dateFormat, REFERENCE_DATE);
      if (isValid(parsed)) {
        return { ok: true, value: format(parsed, 'yyyy-MM-dd') };
      }
    }
  }

  return { ok: false, reason: 'date_parse_failed' };
}

export function normalizeCurrency(value: string): NormalizationResult {
  const match = value.match(CURRENCY_PATTERN);
  if (!match) {
    return { ok: false, reason: 'currency_parse_failed' };
  }

  const symbol = match[1] ?? '';
  const amount = match[2].replace(/,/g, '');
  return { ok: true, value: `${symbol}${amount}` };
}

export const NORMALIZERS: Record<NormalizerId, (value: string) => NormalizationResult> = {
  text: normalizeText,
  date: normalizeDate,
  currency: normalizeCurrency,
};

export function isNormalizerId(id: string): id is NormalizerId {
  return Object.prototype.hasOwnProperty.call(NORMALIZERS, id);
}

export function defaultNormalizerFor(type: FieldType): NormalizerId {
  switch (type) {
    case 'date':
      return 'date';
    case 'currency':
      return 'currency';
    case 'text':
    case 'composite':
      return 'text';
  }
}

export const COMPOSITE_SEPARATOR = ' / ';

/**
 * Normalizes the parts of one match. Composite fields normalize each part on
 * its own and fail if any part fails; other field types take the parts as one
 * string.
 */
export function normalizeParts(
  type: FieldType,
  normalizer: NormalizerId,
  parts: string[]
): NormalizationResult {
  const normalize = NORMALIZERS[normalizer];

  if (type !== 'composite') {
    return normalize(parts.join(' '));
  }

  const normalizedParts: string[] = [];
  for (const part of parts) {
    const result = normalize(part);
    if (!result.ok) {
      return { ok: false, reason: `composite_part_failed:${result.reason}` };
    }
    normalizedParts.push(result.value);
  }
  return { ok: true, value: normalizedParts.join(COMPOSITE_SEPARATOR) };
}
