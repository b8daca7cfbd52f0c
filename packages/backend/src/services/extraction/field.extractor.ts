import { MatchCandidate, FieldExtraction } from '../../types/extraction.types';
import { Segment, SegmentedDocument } from '../../types/document.types';
import { FieldDefinition, PatternRule } from '../../types/template.types';
import { compactWhitespace } from '../../utils/text.utils';
import { ExtractionError, errorMessage } from '../../utils/errors';
import { COMPOSITE_SEPARATOR, normalizeParts } from './normalizers';

interface CapturedPart {
  text: string;
  start: number;
  end: number;
}

/** Narrows a captured span to its non-whitespace content */
function trimSpan(text: string, start: number): CapturedPart | null {
  const leading = text.length - text.trimStart().length;
  const trimmed = text.trim();
  if (!trimmed) return null;
  return { text: trimmed, start: start + leading, end: start + leading + trimmed.length };
}

function capturedParts(field: FieldDefinition, rule: PatternRule, match: RegExpMatchArray): CapturedPart[] {
  const indices = match.indices;
  if (!indices) {
    throw new Error(`pattern /${rule.source}/ was compiled without match indices`);
  }

  const groups =
    field.type === 'composite' && rule.group > 0
      ? Array.from({ length: match.length - rule.group }, (_, offset) => rule.group + offset)
      : [rule.group];

  const parts: CapturedPart[] = [];
  for (const group of groups) {
    const text = match[group];
    const span = indices[group];
    if (text === undefined || span === undefined) continue;
    const part = trimSpan(text, span[0]);
    if (part) parts.push(part);
  }
  return parts;
}

function matchRule(
  field: FieldDefinition,
  rule: PatternRule,
  document: SegmentedDocument,
  segment: Segment
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [];

  for (const match of segment.text.matchAll(rule.matcher)) {
    const parts = capturedParts(field, rule, match);
    if (parts.length === 0) continue;

    const texts = parts.map((part) => compactWhitespace(part.text));
    const normalized = normalizeParts(field.type, rule.normalizer, texts);

    candidates.push({
      fieldKey: field.key,
      documentId: document.id,
      segment,
      rawText: texts.join(field.type === 'composite' ? COMPOSITE_SEPARATOR : ' '),
      normalizedValue: normalized.ok ? normalized.value : null,
      charStart: segment.startOffset + parts[0].start,
      charEnd: segment.startOffset + parts[parts.length - 1].end,
      priority: rule.priority,
      rank: rule.rank,
    });
  }

  return candidates;
}

/**
 * Primary-match order: highest priority, then earliest segment, then earliest
 * offset, then longest span.
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  return (
    b.priority - a.priority ||
    a.segment.location - b.segment.location ||
    a.charStart - b.charStart ||
    b.charEnd - b.charStart - (a.charEnd - a.charStart)
  );
}

export function selectPrimary(candidates: MatchCandidate[]): MatchCandidate | null {
  if (candidates.length === 0) return null;
  return [...candidates].sort(compareCandidates)[0];
}

/**
 * Applies every rule of `field` to each segment in order and collects all
 * non-overlapping matches. `segments` defaults to the whole document; jobs
 * pass a slice in quick mode.
 */
export function extractField(
  field: FieldDefinition,
  document: SegmentedDocument,
  segments: readonly Segment[] = document.segments
): FieldExtraction {
  const candidates: MatchCandidate[] = [];

  try {
    for (const segment of segments) {
      for (const rule of field.rules) {
        candidates.push(...matchRule(field, rule, document, segment));
      }
    }
  } catch (error) {
    throw new ExtractionError(document.id, field.key, `${field.key}: ${errorMessage(error)}`);
  }

  return { candidates, primary: selectPrimary(candidates) };
}
