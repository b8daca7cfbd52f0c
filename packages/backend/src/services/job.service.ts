import { v4 as uuidv4 } from 'uuid';
import { JobMode, JobStatus, LocationType, QUICK_MODE_LIMITS, ReasonCode } from '../config/constants';
import { DocumentRef, IngestedDocument, Segment, SegmentedDocument } from '../types/document.types';
import { FieldDefinition, Template } from '../types/template.types';
import { Cell } from '../types/cell.types';
import { Job, JobError, JobHandle } from '../types/job.types';
import { ReviewRepository } from './repository/review.repository';
import { DocumentSource } from './inventory.service';
import { loadTemplate } from './template.service';
import { segmentDocument } from './segmenter.service';
import { extractField } from './extraction/field.extractor';
import { scoreExtraction } from './extraction/confidence';
import { buildCitation } from './citation.service';
import { creationAuditEntry, materializeCell, materializeErrorCell } from './cell.service';
import { buildResultTable, ResultTable } from './result.service';
import { ExtractionError, NotFoundError, ParseError, errorMessage } from '../utils/errors';
import { nowIso } from '../utils/text.utils';

export interface JobServiceOptions {
  repository: ReviewRepository;
  documentSource: DocumentSource;
  templatePath: string;
}

export interface SubmitOptions {
  templatePath?: string;
}

interface DocumentOutcome {
  cells: Cell[];
  errors: JobError[];
}

/** Quick mode keeps the first pages of a paginated document; sections pass through */
export function selectSegments(mode: JobMode, segments: readonly Segment[]): readonly Segment[] {
  if (mode === JobMode.FULL) return segments;
  return segments.filter(
    (segment) => segment.locationType !== LocationType.PAGE || segment.location <= QUICK_MODE_LIMITS.maxPages
  );
}

export function selectDocuments<T>(mode: JobMode, documents: readonly T[]): readonly T[] {
  return mode === JobMode.QUICK ? documents.slice(0, QUICK_MODE_LIMITS.maxDocuments) : documents;
}

export function selectFields(mode: JobMode, fields: readonly FieldDefinition[]): readonly FieldDefinition[] {
  return mode === JobMode.QUICK ? fields.slice(0, QUICK_MODE_LIMITS.maxFields) : fields;
}

/** Field declaration order first, then document ingestion order */
export function sortCells(cells: Cell[], fields: readonly FieldDefinition[], documents: readonly DocumentRef[]): Cell[] {
  const fieldOrder = new Map(fields.map((field, index) => [field.key, index]));
  const documentOrder = new Map(documents.map((document, index) => [document.id, index]));
  const position = (map: Map<string, number>, key: string): number => map.get(key) ?? Number.MAX_SAFE_INTEGER;

  return [...cells].sort(
    (a, b) =>
      position(fieldOrder, a.fieldKey) - position(fieldOrder, b.fieldKey) ||
      position(documentOrder, a.documentId) - position(documentOrder, b.documentId)
  );
}

class JobFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobFailure';
  }
}

export class JobService {
  private readonly repository: ReviewRepository;
  private readonly documentSource: DocumentSource;
  private readonly templatePath: string;
  private readonly running = new Map<string, Promise<Job>>();

  constructor(options: JobServiceOptions) {
    this.repository = options.repository;
    this.documentSource = options.documentSource;
    this.templatePath = options.templatePath;
  }

  /**
   * Creates a PENDING job and schedules its run off the caller's path. Await
   * `done` (or call `wait`) for synchronous completion; poll `status`
   * otherwise.
   */
  async submit(mode: JobMode, options: SubmitOptions = {}): Promise<JobHandle> {
    const templatePath = options.templatePath ?? this.templatePath;
    const job: Job = {
      id: uuidv4(),
      mode,
      status: JobStatus.PENDING,
      templateId: null,
      templatePath,
      createdAt: nowIso(),
      errors: [],
      documents: [],
      fields: [],
      cellCount: 0,
    };
    await this.repository.saveJob(job);
    console.log(`[Job] ${job.id} submitted (${mode})`);

    const done = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.execute(job, templatePath))
      .finally(() => {
        this.running.delete(job.id);
      });
    this.running.set(job.id, done);
    done.catch((error) => console.error(`[Job] ${job.id} could not record its outcome:`, error));

    return { jobId: job.id, done };
  }

  async wait(jobId: string): Promise<Job> {
    const pending = this.running.get(jobId);
    if (pending) return pending;
    return this.getJob(jobId);
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.repository.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    return job;
  }

  async status(jobId: string): Promise<JobStatus> {
    return (await this.getJob(jobId)).status;
  }

  async latestSucceededJobId(): Promise<string | null> {
    const jobs = await this.repository.listJobs();
    const succeeded = jobs
      .filter((job) => job.status === JobStatus.SUCCEEDED && job.finishedAt)
      .sort((a, b) => (b.finishedAt ?? '').localeCompare(a.finishedAt ?? ''));
    return succeeded[0]?.id ?? null;
  }

  /** Result table of `jobId`, or of the latest succeeded job when omitted */
  async result(jobId?: string): Promise<ResultTable> {
    const effectiveJobId = jobId ?? (await this.latestSucceededJobId());
    if (!effectiveJobId) {
      return { job: null, documents: [], fields: [], rows: [] };
    }

    const snapshot = await this.repository.load(effectiveJobId);
    if (!snapshot) {
      throw new NotFoundError(`Job ${effectiveJobId} not found`);
    }
    return buildResultTable(snapshot);
  }

  private async execute(pending: Job, templatePath: string): Promise<Job> {
    const job: Job = { ...pending, status: JobStatus.RUNNING, startedAt: nowIso() };
    await this.repository.saveJob(job);
    console.log(`[Job] ${job.id} running`);

    try {
      const template = await loadTemplate(templatePath);
      const available = await this.documentSource.listDocuments();
      if (available.length === 0) {
        throw new JobFailure('No documents available to process');
      }

      const documents = selectDocuments(job.mode, available);
      const fields = selectFields(job.mode, template.fields);
      const refs = documents.map((document) => ({ id: document.id, identifier: document.identifier }));

      const outcomes = await Promise.all(
        documents.map((document) => this.processDocument(job, template, document, fields))
      );

      const cells = sortCells(
        outcomes.flatMap((outcome) => outcome.cells),
        fields,
        refs
      );
      await this.repository.saveCells(job.id, cells);
      await this.repository.appendAudit(...cells.map(creationAuditEntry));

      const finished: Job = {
        ...job,
        status: JobStatus.SUCCEEDED,
        templateId: template.id,
        finishedAt: nowIso(),
        errors: outcomes.flatMap((outcome) => outcome.errors),
        documents: refs,
        fields: fields.map((field) => ({ key: field.key, label: field.label, type: field.type })),
        cellCount: cells.length,
      };
      await this.repository.saveJob(finished);
      console.log(
        `[Job] ${job.id} succeeded: ${cells.length} cell(s), ${finished.errors.length} error(s)`
      );
      return finished;
    } catch (error) {
      const failed: Job = {
        ...job,
        status: JobStatus.FAILED,
        finishedAt: nowIso(),
        error: errorMessage(error),
      };
      await this.repository.saveJob(failed);
      console.error(`[Job] ${job.id} failed: ${failed.error}`);
      return failed;
    }
  }

  private async processDocument(
    job: Job,
    template: Template,
    ingested: IngestedDocument,
    fields: readonly FieldDefinition[]
  ): Promise<DocumentOutcome> {
    const documentRef = { id: ingested.id, identifier: ingested.identifier };
    const createdAt = nowIso();
    const contextFor = (field: FieldDefinition) => ({ jobId: job.id, document: documentRef, field, createdAt });

    let document: SegmentedDocument;
    try {
      document = await segmentDocument(ingested);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      console.warn(`[Job] ${job.id} ${error.message}`);
      return {
        cells: fields.map((field) => materializeErrorCell(contextFor(field), ReasonCode.PARSE_ERROR)),
        errors: [
          {
            documentId: ingested.id,
            documentIdentifier: ingested.identifier,
            code: ReasonCode.PARSE_ERROR,
            message: error.message,
          },
        ],
      };
    }

    const segments = selectSegments(job.mode, document.segments);
    const outcome: DocumentOutcome = { cells: [], errors: [] };

    for (const field of fields) {
      try {
        const extraction = extractField(field, document, segments);
        const score = scoreExtraction(field, extraction);
        const citation = extraction.primary ? buildCitation(document, extraction.primary) : null;
        outcome.cells.push(materializeCell(contextFor(field), extraction, score, citation));
      } catch (error) {
        const message = errorMessage(error);
        if (!(error instanceof ExtractionError)) {
          console.error(`[Job] ${job.id} unexpected failure on ${field.key}/${ingested.identifier}:`, error);
        }
        console.warn(`[Job] ${job.id} ${template.id}/${field.key} failed on ${ingested.identifier}: ${message}`);
        outcome.cells.push(materializeErrorCell(contextFor(field), ReasonCode.EXTRACTION_ERROR));
        outcome.errors.push({
          documentId: ingested.id,
          documentIdentifier: ingested.identifier,
          fieldKey: field.key,
          code: ReasonCode.EXTRACTION_ERROR,
          message,
        });
      }
    }

    return outcome;
  }
}
