export enum DocumentFormat {
  PDF = 'PDF',
  HTML = 'HTML',
}

export enum LocationType {
  PAGE = 'page',
  SECTION = 'section',
}

export enum ReviewState {
  EXTRACTED = 'EXTRACTED',
  CONFIRMED = 'CONFIRMED',
  REJECTED = 'REJECTED',
  MANUAL_UPDATED = 'MANUAL_UPDATED',
  MISSING_DATA = 'MISSING_DATA',
}

export enum JobMode {
  QUICK = 'quick',
  FULL = 'full',
}

export enum JobStatus {
  PENDING = 'PENDING',
  RUNNING = 'RUNNING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
}

export enum ReasonCode {
  SINGLE_MATCH = 'SINGLE_MATCH',
  MULTIPLE_MATCHES_REDUCED_CONFIDENCE = 'MULTIPLE_MATCHES_REDUCED_CONFIDENCE',
  LOW_PRIORITY_PATTERN = 'LOW_PRIORITY_PATTERN',
  NORMALIZATION_FAILED = 'NORMALIZATION_FAILED',
  NO_MATCH = 'NO_MATCH',
  PARSE_ERROR = 'PARSE_ERROR',
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
}

export const FILE_EXTENSION_TO_FORMAT: Record<string, DocumentFormat> = {
  pdf: DocumentFormat.PDF,
  html: DocumentFormat.HTML,
  htm: DocumentFormat.HTML,
};

/** Deterministic input slice used by quick-mode jobs */
export const QUICK_MODE_LIMITS = {
  maxDocuments: 1,
  maxPages: 3,
  maxFields: 5,
} as const;

export const SNIPPET_RADIUS = 140;
export const SNIPPET_ELLIPSIS = '...';

export const CONFIDENCE_WEIGHTS = {
  // base score for the best rule of a field; the worst rule scores baseFloor
  baseCeiling: 0.95,
  baseFloor: 0.5,
  // multiple-match factor is multiMatchFloor + (1 - multiMatchFloor) / n
  multiMatchFloor: 0.5,
  lowPriorityPenalty: 0.1,
  normalizationPenalty: 0.1,
  // a matched cell never scores 0, which is reserved for MISSING_DATA
  minMatchedScore: 0.01,
} as const;

export const SYSTEM_ACTOR = 'system';
