import { DocumentFormat, LocationType } from '../config/constants';

/** A document as supplied by the ingestion collaborator */
export interface IngestedDocument {
  id: string;
  identifier: string;
  rawBytes: Buffer;
  format: DocumentFormat;
}

export interface Segment {
  locationType: LocationType;
  /** 1-based page or section index */
  location: number;
  /** Section heading, when the segmenter found one */
  label?: string;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface SegmentedDocument {
  id: string;
  identifier: string;
  format: DocumentFormat;
  canonicalText: string;
  segments: Segment[];
}

export interface DocumentRef {
  id: string;
  identifier: string;
}
