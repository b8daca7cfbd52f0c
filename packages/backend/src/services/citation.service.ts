import { SNIPPET_ELLIPSIS, SNIPPET_RADIUS } from '../config/constants';
import { SegmentedDocument } from '../types/document.types';
import { Citation, MatchCandidate } from '../types/extraction.types';
import { compactWhitespace } from '../utils/text.utils';

export function buildSnippet(document: SegmentedDocument, match: MatchCandidate, radius = SNIPPET_RADIUS): string {
  const { startOffset, endOffset } = match.segment;
  const left = Math.max(startOffset, match.charStart - radius);
  const right = Math.min(endOffset, match.charEnd + radius);

  const body = compactWhitespace(document.canonicalText.slice(left, right));
  const prefix = left > startOffset ? SNIPPET_ELLIPSIS : '';
  const suffix = right < endOffset ? SNIPPET_ELLIPSIS : '';
  return `${prefix}${body}${suffix}`;
}

export function buildCitation(document: SegmentedDocument, match: MatchCandidate): Citation {
  return Object.freeze({
    documentId: document.id,
    documentIdentifier: document.identifier,
    locationType: match.segment.locationType,
    location: match.segment.location,
    snippet: buildSnippet(document, match),
    charStart: match.charStart,
    charEnd: match.charEnd,
    coordinates: null,
  });
}
