import { ReasonCode, ReviewState } from '../config/constants';
import { FieldType } from './template.types';
import { Citation } from './extraction.types';

export interface Cell {
  cellId: string;
  jobId: string;
  documentId: string;
  documentIdentifier: string;
  fieldKey: string;
  fieldLabel: string;
  fieldType: FieldType;
  value: string | null;
  valueRaw: string | null;
  valueNormalized: string | null;
  confidence: number;
  confidenceReasons: ReasonCode[];
  reviewState: ReviewState;
  citation: Citation | null;
  candidateCount: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type AuditAction = 'CREATED' | 'CONFIRM' | 'REJECT' | 'MANUAL_EDIT';

export interface CellSnapshot {
  value: string | null;
  valueRaw: string | null;
  reviewState: ReviewState;
}

export interface AuditEntry {
  cellId: string;
  sequence: number;
  actor: string;
  timestamp: string;
  action: AuditAction;
  reason: string | null;
  before: CellSnapshot | null;
  after: CellSnapshot;
}

export interface ReviewAction {
  actor: string;
  reviewState?: ReviewState;
  manualValue?: string;
  reason?: string;
  /** When set, the action fails unless the cell is still at this version */
  expectedVersion?: number;
}
