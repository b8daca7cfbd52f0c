import { LocationType } from '../config/constants';
import { buildCitation } from '../services/citation.service';
import { extractField } from '../services/extraction/field.extractor';
import { SegmentedDocument } from '../types/document.types';
import { segmentedDocument } from './helpers/documentHelpers';
import { fieldByKey } from './fixtures/templates';

function citePrimary(document: SegmentedDocument) {
  const { primary } = extractField(fieldByKey('effective_date_term'), document);
  if (!primary) throw new Error('expected a primary match');
  return { citation: buildCitation(document, primary), primary };
}

describe('Citation Builder', () => {
  it('should cite the page and canonical offsets of the primary match', () => {
    const text = 'This Agreement is effective as of January 1, 2023 and expires December 31, 2025.';
    const { citation } = citePrimary(segmentedDocument([text]));

    expect(citation).toEqual({
      documentId: 'doc-contract.pdf',
      documentIdentifier: 'contract.pdf',
      locationType: LocationType.PAGE,
      location: 1,
      snippet: text,
      charStart: 34,
      charEnd: 49,
      coordinates: null,
    });
    expect(Object.isFrozen(citation)).toBe(true);
  });

  it('should clip a long segment to the snippet window with ellipses', () => {
    const text = `${'x'.repeat(200)} effective as of January 1, 2023 ${'y'.repeat(200)}`;
    const { citation } = citePrimary(segmentedDocument([text]));

    expect(citation.charStart).toBe(217);
    expect(citation.charEnd).toBe(232);
    expect(citation.snippet).toBe(
      `...${'x'.repeat(123)} effective as of January 1, 2023 ${'y'.repeat(139)}...`
    );
  });

  it('should not let the snippet cross into the previous segment', () => {
    const document = segmentedDocument([
      'Cover page with a long heading',
      `effective as of January 1, 2023 ${'z'.repeat(300)}`,
    ]);
    const { citation } = citePrimary(document);

    expect(citation.location).toBe(2);
    expect(citation.charStart).toBe(48);
    expect(citation.snippet).toBe(`effective as of January 1, 2023 ${'z'.repeat(139)}...`);
  });

  it('should keep every citation inside its segment', () => {
    const documents = [
      segmentedDocument(['Cover', 'Terms effective as of May 5, 2022 apply.']),
      segmentedDocument(['effective as of June 6, 2020'], LocationType.SECTION),
      segmentedDocument(['a', 'b', `${'q'.repeat(500)} effective as of July 7, 2021`]),
    ];

    for (const document of documents) {
      const { citation, primary } = citePrimary(document);
      expect(primary.segment.startOffset).toBeLessThanOrEqual(citation.charStart);
      expect(citation.charStart).toBeLessThanOrEqual(citation.charEnd);
      expect(citation.charEnd).toBeLessThanOrEqual(primary.segment.endOffset);
      expect(document.canonicalText.slice(citation.charStart, citation.charEnd)).toBe(primary.rawText);
    }
  });
});
