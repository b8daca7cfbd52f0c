import { AuditEntry, Cell } from '../../types/cell.types';
import { Job, JobSnapshot } from '../../types/job.types';

export interface ReviewCommit {
  cell: Cell;
  audit: AuditEntry;
}

/**
 * Computes a review from the stored cell and its audit log. Runs synchronously
 * inside the repository's critical section; throwing aborts the commit.
 */
export type ReviewMutation = (cell: Cell, log: readonly AuditEntry[]) => ReviewCommit;

/**
 * Persistence capability handed to the job and review services. Objects
 * cross this boundary by value; implementations serialize their own writes.
 */
export interface ReviewRepository {
  saveJob(job: Job): Promise<void>;
  getJob(jobId: string): Promise<Job | null>;
  listJobs(): Promise<Job[]>;

  /** Inserts the cells produced by a job run */
  saveCells(jobId: string, cells: Cell[]): Promise<void>;
  getCell(cellId: string): Promise<Cell | null>;
  /** Compare-and-set on `version`; throws ConcurrencyError when the stored cell moved on */
  updateCell(cell: Cell, expectedVersion: number): Promise<void>;

  /** Each entry's sequence must be exactly one past the cell's last entry */
  appendAudit(...entries: AuditEntry[]): Promise<void>;
  listAudit(cellId: string): Promise<AuditEntry[]>;

  /**
   * Reads the cell and its audit log, then stores the updated cell and appends
   * the entry in one atomic step. Throws NotFoundError for an unknown cell.
   */
  commitReview(cellId: string, mutate: ReviewMutation): Promise<ReviewCommit>;

  load(jobId: string): Promise<JobSnapshot | null>;
}
