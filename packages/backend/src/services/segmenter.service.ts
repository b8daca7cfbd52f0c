import { DocumentFormat } from '../config/constants';
import { IngestedDocument, SegmentedDocument } from '../types/document.types';
import { ParseError, errorMessage } from '../utils/errors';
import { buildCanonicalText, SegmentDraft } from './segmentation/canonical';
import { segmentHtml } from './segmentation/html.segmenter';
import { segmentPdf } from './segmentation/pdf.segmenter';

/**
 * Turns raw document bytes into canonical text plus ordered page or section
 * segments. Any failure surfaces as a ParseError scoped to the document.
 */
export async function segmentDocument(document: IngestedDocument): Promise<SegmentedDocument> {
  let drafts: SegmentDraft[];

  try {
    switch (document.format) {
      case DocumentFormat.PDF:
        drafts = await segmentPdf(document.rawBytes);
        break;
      case DocumentFormat.HTML:
        drafts = segmentHtml(document.rawBytes);
        break;
      default:
        throw new Error(`Unsupported document format: ${String(document.format)}`);
    }
  } catch (error) {
    throw new ParseError(document.id, `${document.identifier} could not be parsed: ${errorMessage(error)}`);
  }

  const { canonicalText, segments } = buildCanonicalText(drafts);
  console.log(`[Segmenter] ${document.identifier}: ${segments.length} segment(s), ${canonicalText.length} chars`);

  return {
    id: document.id,
    identifier: document.identifier,
    format: document.format,
    canonicalText,
    segments,
  };
}
