import { AuditEntry, Cell } from '../../types/cell.types';
import { Job, JobSnapshot } from '../../types/job.types';
import { ConcurrencyError, NotFoundError } from '../../utils/errors';
import { ReviewCommit, ReviewMutation, ReviewRepository } from './review.repository';
import { assertCommit, assertNextSequence } from './sequence';

export class InMemoryReviewRepository implements ReviewRepository {
  private readonly jobs = new Map<string, Job>();
  private readonly cells = new Map<string, Cell>();
  private readonly cellsByJob = new Map<string, string[]>();
  private readonly audit = new Map<string, AuditEntry[]>();

  async saveJob(job: Job): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async getJob(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async listJobs(): Promise<Job[]> {
    return [...this.jobs.values()].map((job) => structuredClone(job));
  }

  async saveCells(jobId: string, cells: Cell[]): Promise<void> {
    const ids = this.cellsByJob.get(jobId) ?? [];
    for (const cell of cells) {
      this.cells.set(cell.cellId, structuredClone(cell));
      ids.push(cell.cellId);
    }
    this.cellsByJob.set(jobId, ids);
  }

  async getCell(cellId: string): Promise<Cell | null> {
    const cell = this.cells.get(cellId);
    return cell ? structuredClone(cell) : null;
  }

  async updateCell(cell: Cell, expectedVersion: number): Promise<void> {
    const stored = this.cells.get(cell.cellId);
    if (!stored) {
      throw new NotFoundError(`Cell ${cell.cellId} not found`);
    }
    if (stored.version !== expectedVersion) {
      throw new ConcurrencyError(cell.cellId, expectedVersion, stored.version);
    }
    this.cells.set(cell.cellId, structuredClone(cell));
  }

  async appendAudit(...entries: AuditEntry[]): Promise<void> {
    for (const entry of entries) {
      const log = this.audit.get(entry.cellId) ?? [];
      assertNextSequence(log, entry);
      log.push(structuredClone(entry));
      this.audit.set(entry.cellId, log);
    }
  }

  async listAudit(cellId: string): Promise<AuditEntry[]> {
    return (this.audit.get(cellId) ?? []).map((entry) => structuredClone(entry));
  }

  async commitReview(cellId: string, mutate: ReviewMutation): Promise<ReviewCommit> {
    const stored = this.cells.get(cellId);
    if (!stored) {
      throw new NotFoundError(`Cell ${cellId} not found`);
    }

    const log = this.audit.get(cellId) ?? [];
    const { cell, audit } = mutate(structuredClone(stored), log.map((entry) => structuredClone(entry)));
    assertCommit(cellId, stored, cell);
    assertNextSequence(log, audit);

    this.cells.set(cellId, structuredClone(cell));
    this.audit.set(cellId, [...log, structuredClone(audit)]);
    return { cell: structuredClone(cell), audit: structuredClone(audit) };
  }

  async load(jobId: string): Promise<JobSnapshot | null> {
    const job = this.jobs.get(jobId);
    if (!job) return null;

    const cells = (this.cellsByJob.get(jobId) ?? []).flatMap((cellId) => {
      const cell = this.cells.get(cellId);
      return cell ? [structuredClone(cell)] : [];
    });
    return { job: structuredClone(job), cells };
  }
}
