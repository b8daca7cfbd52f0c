import { v4 as uuidv4 } from 'uuid';
import { ReasonCode, ReviewState, SYSTEM_ACTOR } from '../config/constants';
import { DocumentRef } from '../types/document.types';
import { FieldDefinition } from '../types/template.types';
import { Citation, ConfidenceResult, FieldExtraction } from '../types/extraction.types';
import { AuditEntry, Cell, CellSnapshot } from '../types/cell.types';

interface CellContext {
  jobId: string;
  document: DocumentRef;
  field: FieldDefinition;
  createdAt: string;
}

function baseCell(context: CellContext): Omit<
  Cell,
  'value' | 'valueRaw' | 'valueNormalized' | 'confidence' | 'confidenceReasons' | 'reviewState' | 'citation' | 'candidateCount'
> {
  return {
    cellId: uuidv4(),
    jobId: context.jobId,
    documentId: context.document.id,
    documentIdentifier: context.document.identifier,
    fieldKey: context.field.key,
    fieldLabel: context.field.label,
    fieldType: context.field.type,
    version: 1,
    createdAt: context.createdAt,
    updatedAt: context.createdAt,
  };
}

/**
 * Builds the cell for one (document, field) pair. A primary match yields an
 * EXTRACTED cell carrying the raw text as its value; no match yields
 * MISSING_DATA with no citation.
 */
export function materializeCell(
  context: CellContext,
  extraction: FieldExtraction,
  score: ConfidenceResult,
  citation: Citation | null
): Cell {
  const { primary } = extraction;

  if (!primary) {
    return {
      ...baseCell(context),
      value: null,
      valueRaw: null,
      valueNormalized: null,
      confidence: 0,
      confidenceReasons: score.reasons,
      reviewState: ReviewState.MISSING_DATA,
      citation: null,
      candidateCount: 0,
    };
  }

  return {
    ...baseCell(context),
    value: primary.rawText,
    valueRaw: primary.rawText,
    valueNormalized: primary.normalizedValue,
    confidence: score.confidence,
    confidenceReasons: score.reasons,
    reviewState: ReviewState.EXTRACTED,
    citation,
    candidateCount: extraction.candidates.length,
  };
}

export function materializeErrorCell(
  context: CellContext,
  code: ReasonCode.PARSE_ERROR | ReasonCode.EXTRACTION_ERROR
): Cell {
  return {
    ...baseCell(context),
    value: null,
    valueRaw: null,
    valueNormalized: null,
    confidence: 0,
    confidenceReasons: [code],
    reviewState: ReviewState.MISSING_DATA,
    citation: null,
    candidateCount: 0,
  };
}

export function snapshotOf(cell: Cell): CellSnapshot {
  return {
    value: cell.value,
    valueRaw: cell.valueRaw,
    reviewState: cell.reviewState,
  };
}

/** First entry of every cell's audit log */
export function creationAuditEntry(cell: Cell): AuditEntry {
  return {
    cellId: cell.cellId,
    sequence: 1,
    actor: SYSTEM_ACTOR,
    timestamp: cell.createdAt,
    action: 'CREATED',
    reason: cell.confidenceReasons.join(','),
    before: null,
    after: snapshotOf(cell),
  };
}
