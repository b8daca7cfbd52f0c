import { FieldType } from '../types/template.types';
import { Citation } from '../types/extraction.types';
import { AuditEntry, Cell, CellSnapshot } from '../types/cell.types';
import { Job, JobError, JobSnapshot } from '../types/job.types';

// Wire records handed to the API and export layers

export interface CitationRecord {
  document_id: string;
  document_identifier: string;
  location_type: string;
  location: number;
  snippet: string;
  char_start: number;
  char_end: number;
  coordinates: null;
}

export interface CellRecord {
  cell_id: string;
  document_id: string;
  document_identifier: string;
  field_key: string;
  value: string | null;
  value_raw: string | null;
  value_normalized: string | null;
  review_state: string;
  confidence: number;
  confidence_reasons: string[];
  citation: CitationRecord | null;
  version: number;
}

export interface AuditRecord {
  cell_id: string;
  sequence: number;
  actor: string;
  timestamp: string;
  action: string;
  reason: string | null;
  before: SnapshotRecord | null;
  after: SnapshotRecord;
}

interface SnapshotRecord {
  value: string | null;
  value_raw: string | null;
  review_state: string;
}

export interface JobErrorRecord {
  document_id: string;
  document_identifier: string;
  field_key: string | null;
  code: string;
  message: string;
}

export interface JobRecord {
  id: string;
  mode: string;
  status: string;
  template_id: string | null;
  template_path: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  error: string | null;
  errors: JobErrorRecord[];
  cell_count: number;
}

export interface FieldColumn {
  field_key: string;
  field_label: string;
  field_type: FieldType;
}

export interface ResultRow extends FieldColumn {
  cells: CellRecord[];
}

export interface ResultTable {
  job: JobRecord | null;
  documents: { id: string; identifier: string }[];
  fields: FieldColumn[];
  rows: ResultRow[];
}

export function toCitationRecord(citation: Citation): CitationRecord {
  return {
    document_id: citation.documentId,
    document_identifier: citation.documentIdentifier,
    location_type: citation.locationType,
    location: citation.location,
    snippet: citation.snippet,
    char_start: citation.charStart,
    char_end: citation.charEnd,
    coordinates: null,
  };
}

export function toCellRecord(cell: Cell): CellRecord {
  return {
    cell_id: cell.cellId,
    document_id: cell.documentId,
    document_identifier: cell.documentIdentifier,
    field_key: cell.fieldKey,
    value: cell.value,
    value_raw: cell.valueRaw,
    value_normalized: cell.valueNormalized,
    review_state: cell.reviewState,
    confidence: cell.confidence,
    confidence_reasons: [...cell.confidenceReasons],
    citation: cell.citation ? toCitationRecord(cell.citation) : null,
    version: cell.version,
  };
}

function toSnapshotRecord(snapshot: CellSnapshot): SnapshotRecord {
  return {
    value: snapshot.value,
    value_raw: snapshot.valueRaw,
    review_state: snapshot.reviewState,
  };
}

export function toAuditRecord(entry: AuditEntry): AuditRecord {
  return {
    cell_id: entry.cellId,
    sequence: entry.sequence,
    actor: entry.actor,
    timestamp: entry.timestamp,
    action: entry.action,
    reason: entry.reason,
    before: entry.before ? toSnapshotRecord(entry.before) : null,
    after: toSnapshotRecord(entry.after),
  };
}

function toJobErrorRecord(error: JobError): JobErrorRecord {
  return {
    document_id: error.documentId,
    document_identifier: error.documentIdentifier,
    field_key: error.fieldKey ?? null,
    code: error.code,
    message: error.message,
  };
}

export function toJobRecord(job: Job): JobRecord {
  return {
    id: job.id,
    mode: job.mode,
    status: job.status,
    template_id: job.templateId,
    template_path: job.templatePath,
    created_at: job.createdAt,
    started_at: job.startedAt ?? null,
    finished_at: job.finishedAt ?? null,
    error: job.error ?? null,
    errors: job.errors.map(toJobErrorRecord),
    cell_count: job.cellCount,
  };
}

/**
 * One row per template field, in template order; each row holds that
 * field's cells in document ingestion order.
 */
export function buildResultTable(snapshot: JobSnapshot): ResultTable {
  const { job, cells } = snapshot;
  const documentOrder = new Map(job.documents.map((document, index) => [document.id, index]));

  const rows = job.fields.map((field) => ({
    field_key: field.key,
    field_label: field.label,
    field_type: field.type,
    cells: cells
      .filter((cell) => cell.fieldKey === field.key)
      .sort((a, b) => (documentOrder.get(a.documentId) ?? 0) - (documentOrder.get(b.documentId) ?? 0))
      .map(toCellRecord),
  }));

  return {
    job: toJobRecord(job),
    documents: job.documents.map((document) => ({ id: document.id, identifier: document.identifier })),
    fields: job.fields.map((field) => ({ field_key: field.key, field_label: field.label, field_type: field.type })),
    rows,
  };
}
