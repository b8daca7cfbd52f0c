import { JobMode, JobStatus, ReasonCode } from '../config/constants';
import { DocumentRef } from './document.types';
import { FieldRef } from './template.types';
import { Cell } from './cell.types';

export interface JobError {
  documentId: string;
  documentIdentifier: string;
  fieldKey?: string;
  code: ReasonCode.PARSE_ERROR | ReasonCode.EXTRACTION_ERROR;
  message: string;
}

export interface Job {
  id: string;
  mode: JobMode;
  status: JobStatus;
  templateId: string | null;
  templatePath: string | null;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  /** Job-level failure summary */
  error?: string;
  errors: JobError[];
  documents: DocumentRef[];
  fields: FieldRef[];
  cellCount: number;
}

export interface JobHandle {
  jobId: string;
  done: Promise<Job>;
}

export interface JobSnapshot {
  job: Job;
  cells: Cell[];
}
