import { LocationType } from '../../config/constants';
import { Segment } from '../../types/document.types';

export interface SegmentDraft {
  locationType: LocationType;
  location: number;
  label?: string;
  text: string;
}

export const SEGMENT_SEPARATOR = '\n\n';

/**
 * Joins already-normalized segment texts into the canonical document text and
 * records each segment's offsets in it. Matching runs on segment text, so an
 * offset inside a segment maps to `startOffset + index` in canonical text.
 */
export function buildCanonicalText(drafts: SegmentDraft[]): { canonicalText: string; segments: Segment[] } {
  const segments: Segment[] = [];
  let canonicalText = '';

  drafts.forEach((draft, index) => {
    if (index > 0) {
      canonicalText += SEGMENT_SEPARATOR;
    }
    const startOffset = canonicalText.length;
    canonicalText += draft.text;

    segments.push({
      locationType: draft.locationType,
      location: draft.location,
      ...(draft.label !== undefined && { label: draft.label }),
      text: draft.text,
      startOffset,
      endOffset: canonicalText.length,
    });
  });

  return { canonicalText, segments };
}
