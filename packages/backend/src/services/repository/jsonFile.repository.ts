import path from 'path';
import { AuditEntry, Cell } from '../../types/cell.types';
import { Job, JobSnapshot } from '../../types/job.types';
import { ConcurrencyError, NotFoundError } from '../../utils/errors';
import { readJsonFile, saveJsonFile, listJsonFiles } from '../../utils/fileSystem';
import { withLock } from '../../utils/lock';
import { ReviewCommit, ReviewMutation, ReviewRepository } from './review.repository';
import { assertCommit, assertNextSequence } from './sequence';

interface JobFile {
  job: Job;
  cells: Cell[];
  audit: Record<string, AuditEntry[]>;
}

interface CellJobMapping {
  [cellId: string]: string; // cellId -> jobId
}

const CELL_JOB_MAPPING_FILE = '_cell_job_mapping.json';

/**
 * Stores one JSON file per job (job, cells and their audit logs) plus an index
 * from cell id to job id. Every write happens under a single in-process lock
 * and replaces its file atomically, so unlocked readers see whole files.
 */
export class JsonFileReviewRepository implements ReviewRepository {
  private readonly lockKey: string;

  constructor(private readonly jobsDir: string) {
    this.lockKey = `json-repository:${jobsDir}`;
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  private getMappingPath(): string {
    return path.join(this.jobsDir, CELL_JOB_MAPPING_FILE);
  }

  private async readJobFile(jobId: string): Promise<JobFile | null> {
    return readJsonFile<JobFile>(this.getJobPath(jobId));
  }

  private async readJobFileForCell(cellId: string): Promise<JobFile | null> {
    const mapping = (await readJsonFile<CellJobMapping>(this.getMappingPath())) ?? {};
    const jobId = mapping[cellId];
    return jobId ? this.readJobFile(jobId) : null;
  }

  async saveJob(job: Job): Promise<void> {
    await withLock(this.lockKey, async () => {
      const existing = await this.readJobFile(job.id);
      await saveJsonFile<JobFile>(this.getJobPath(job.id), {
        job,
        cells: existing?.cells ?? [],
        audit: existing?.audit ?? {},
      });
    });
  }

  async getJob(jobId: string): Promise<Job | null> {
    const file = await this.readJobFile(jobId);
    return file?.job ?? null;
  }

  async listJobs(): Promise<Job[]> {
    const files = await listJsonFiles(this.jobsDir);
    const jobs: Job[] = [];
    for (const fileName of files) {
      if (fileName === CELL_JOB_MAPPING_FILE) continue;
      const file = await readJsonFile<JobFile>(path.join(this.jobsDir, fileName));
      if (file?.job) jobs.push(file.job);
    }
    return jobs;
  }

  async saveCells(jobId: string, cells: Cell[]): Promise<void> {
    await withLock(this.lockKey, async () => {
      const file = await this.readJobFile(jobId);
      if (!file) {
        throw new NotFoundError(`Job ${jobId} not found`);
      }

      file.cells.push(...cells);
      await saveJsonFile(this.getJobPath(jobId), file);

      const mapping = (await readJsonFile<CellJobMapping>(this.getMappingPath())) ?? {};
      for (const cell of cells) {
        mapping[cell.cellId] = jobId;
      }
      await saveJsonFile(this.getMappingPath(), mapping);
      console.log(`[Repository] Saved ${cells.length} cell(s) for job ${jobId}`);
    });
  }

  async getCell(cellId: string): Promise<Cell | null> {
    const file = await this.readJobFileForCell(cellId);
    return file?.cells.find((cell) => cell.cellId === cellId) ?? null;
  }

  async updateCell(cell: Cell, expectedVersion: number): Promise<void> {
    await withLock(this.lockKey, async () => {
      const file = await this.readJobFile(cell.jobId);
      const index = file ? file.cells.findIndex((stored) => stored.cellId === cell.cellId) : -1;
      if (!file || index === -1) {
        throw new NotFoundError(`Cell ${cell.cellId} not found`);
      }

      const stored = file.cells[index];
      if (stored.version !== expectedVersion) {
        throw new ConcurrencyError(cell.cellId, expectedVersion, stored.version);
      }

      file.cells[index] = cell;
      await saveJsonFile(this.getJobPath(cell.jobId), file);
    });
  }

  async appendAudit(...entries: AuditEntry[]): Promise<void> {
    if (entries.length === 0) return;

    await withLock(this.lockKey, async () => {
      const mapping = (await readJsonFile<CellJobMapping>(this.getMappingPath())) ?? {};
      const touched = new Map<string, JobFile>();

      for (const entry of entries) {
        const jobId = mapping[entry.cellId];
        if (!jobId) {
          throw new NotFoundError(`Cell ${entry.cellId} not found`);
        }

        let file = touched.get(jobId);
        if (!file) {
          const loaded = await this.readJobFile(jobId);
          if (!loaded) {
            throw new NotFoundError(`Job ${jobId} not found`);
          }
          file = loaded;
          touched.set(jobId, file);
        }

        const log = file.audit[entry.cellId] ?? [];
        assertNextSequence(log, entry);
        log.push(entry);
        file.audit[entry.cellId] = log;
      }

      for (const [jobId, file] of touched) {
        await saveJsonFile(this.getJobPath(jobId), file);
      }
    });
  }

  async listAudit(cellId: string): Promise<AuditEntry[]> {
    const file = await this.readJobFileForCell(cellId);
    return file?.audit[cellId] ?? [];
  }

  async commitReview(cellId: string, mutate: ReviewMutation): Promise<ReviewCommit> {
    return withLock(this.lockKey, async () => {
      const mapping = (await readJsonFile<CellJobMapping>(this.getMappingPath())) ?? {};
      const jobId = mapping[cellId];
      const file = jobId ? await this.readJobFile(jobId) : null;
      const index = file ? file.cells.findIndex((stored) => stored.cellId === cellId) : -1;
      if (!jobId || !file || index === -1) {
        throw new NotFoundError(`Cell ${cellId} not found`);
      }

      const stored = file.cells[index];
      const log = file.audit[cellId] ?? [];
      const commit = mutate(structuredClone(stored), structuredClone(log));
      assertCommit(cellId, stored, commit.cell);
      assertNextSequence(log, commit.audit);

      file.cells[index] = commit.cell;
      file.audit[cellId] = [...log, commit.audit];
      await saveJsonFile(this.getJobPath(jobId), file);
      return commit;
    });
  }

  async load(jobId: string): Promise<JobSnapshot | null> {
    const file = await this.readJobFile(jobId);
    return file ? { job: file.job, cells: file.cells } : null;
  }
}
