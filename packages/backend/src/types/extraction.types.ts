import { LocationType, ReasonCode } from '../config/constants';
import { Segment } from './document.types';

export interface MatchCandidate {
  fieldKey: string;
  documentId: string;
  segment: Segment;
  rawText: string;
  normalizedValue: string | null;
  charStart: number;
  charEnd: number;
  priority: number;
  rank: number;
}

export interface FieldExtraction {
  candidates: MatchCandidate[];
  primary: MatchCandidate | null;
}

export interface ConfidenceResult {
  confidence: number;
  reasons: ReasonCode[];
}

export interface Citation {
  documentId: string;
  documentIdentifier: string;
  locationType: LocationType;
  location: number;
  snippet: string;
  charStart: number;
  charEnd: number;
  /** Reserved for bounding-box support; always null */
  coordinates: null;
}
