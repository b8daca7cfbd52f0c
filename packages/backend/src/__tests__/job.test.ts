import path from 'path';
import { JobMode, JobStatus, LocationType, ReasonCode, ReviewState } from '../config/constants';
import { JobService, selectSegments } from '../services/job.service';
import { ReviewService } from '../services/review.service';
import { InMemoryReviewRepository } from '../services/repository/memory.repository';
import * as normalizers from '../services/extraction/normalizers';
import { IngestedDocument } from '../types/document.types';
import { Cell } from '../types/cell.types';
import { Job } from '../types/job.types';
import {
  StaticDocumentSource,
  corruptPdfDocument,
  htmlDocument,
  pdfDocument,
} from './helpers/documentHelpers';
import { MASTER_SERVICES_PAGES, SCENARIO_A_HTML, SCENARIO_B_HTML } from './fixtures/contracts';

jest.mock('pdf-parse', () =>
  jest.requireActual<typeof import('./helpers/pdfParseMock')>('./helpers/pdfParseMock').fakePdfParse
);

const TEMPLATE_PATH = path.join(__dirname, 'fixtures', 'contract.template.json');

function createService(documents: IngestedDocument[]) {
  const repository = new InMemoryReviewRepository();
  const service = new JobService({
    repository,
    documentSource: new StaticDocumentSource(documents),
    templatePath: TEMPLATE_PATH,
  });
  return { repository, service };
}

async function runJob(documents: IngestedDocument[], mode: JobMode) {
  const { repository, service } = createService(documents);
  const handle = await service.submit(mode);
  const job = await handle.done;
  const snapshot = await repository.load(job.id);
  if (!snapshot) throw new Error(`job ${job.id} was not stored`);
  return { job, cells: snapshot.cells, repository, service };
}

function cellFor(cells: Cell[], documentIdentifier: string, fieldKey: string): Cell {
  const cell = cells.find((c) => c.documentIdentifier === documentIdentifier && c.fieldKey === fieldKey);
  if (!cell) throw new Error(`no cell for ${documentIdentifier}/${fieldKey}`);
  return cell;
}

/** Everything a rerun must reproduce */
function comparable(cell: Cell) {
  return {
    documentId: cell.documentId,
    fieldKey: cell.fieldKey,
    value: cell.value,
    valueRaw: cell.valueRaw,
    valueNormalized: cell.valueNormalized,
    confidence: cell.confidence,
    confidenceReasons: cell.confidenceReasons,
    reviewState: cell.reviewState,
    citation: cell.citation,
  };
}

describe('Job Orchestrator', () => {
  beforeAll(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  describe('scenarios', () => {
    const documents = [htmlDocument('a.html', SCENARIO_A_HTML), htmlDocument('b.html', SCENARIO_B_HTML)];

    it('should extract a single effective date match (scenario A)', async () => {
      const { job, cells } = await runJob(documents, JobMode.FULL);
      const cell = cellFor(cells, 'a.html', 'effective_date_term');

      expect(job.status).toBe(JobStatus.SUCCEEDED);
      expect(cell).toMatchObject({
        value: 'January 1, 2023',
        valueRaw: 'January 1, 2023',
        valueNormalized: '2023-01-01',
        reviewState: ReviewState.EXTRACTED,
        confidence: 0.95,
        confidenceReasons: [ReasonCode.SINGLE_MATCH],
        version: 1,
      });
      expect(cell.citation).toEqual({
        documentId: 'doc-a.html',
        documentIdentifier: 'a.html',
        locationType: LocationType.SECTION,
        location: 1,
        snippet: 'This Agreement is effective as of January 1, 2023 and expires December 31, 2025.',
        charStart: 34,
        charEnd: 49,
        coordinates: null,
      });
    });

    it('should lower confidence when two rules match (scenario B)', async () => {
      const { cells } = await runJob(documents, JobMode.FULL);
      const single = cellFor(cells, 'a.html', 'effective_date_term');
      const multiple = cellFor(cells, 'b.html', 'effective_date_term');

      expect(multiple.candidateCount).toBe(2);
      expect(multiple.confidenceReasons).toEqual([ReasonCode.MULTIPLE_MATCHES_REDUCED_CONFIDENCE]);
      expect(multiple.value).toBe('January 1, 2023');
      expect(multiple.confidence).toBeLessThan(single.confidence);
    });

    it('should mark a field without matches as missing (scenario C)', async () => {
      const { cells } = await runJob(documents, JobMode.FULL);
      const cell = cellFor(cells, 'a.html', 'governing_law');

      expect(cell).toMatchObject({
        value: null,
        valueRaw: null,
        reviewState: ReviewState.MISSING_DATA,
        confidence: 0,
        confidenceReasons: [ReasonCode.NO_MATCH],
        citation: null,
      });
    });

    it('should keep the raw value through a manual edit (scenario D)', async () => {
      const { cells, repository } = await runJob(documents, JobMode.FULL);
      const original = cellFor(cells, 'a.html', 'effective_date_term');
      const review = new ReviewService(repository);

      const { cell } = await review.applyReviewAction(original.cellId, {
        actor: 'reviewer-1',
        manualValue: 'Jan 1 2023',
      });

      expect(cell.reviewState).toBe(ReviewState.MANUAL_UPDATED);
      expect(cell.value).toBe('Jan 1 2023');
      expect(cell.valueRaw).toBe('January 1, 2023');
      expect(cell.citation).toEqual(original.citation);

      const log = await review.getAuditLog(original.cellId);
      expect(log).toHaveLength(2);
      expect(log[1]).toMatchObject({
        sequence: 2,
        action: 'MANUAL_EDIT',
        before: { value: 'January 1, 2023', reviewState: ReviewState.EXTRACTED },
        after: { value: 'Jan 1 2023', valueRaw: 'January 1, 2023', reviewState: ReviewState.MANUAL_UPDATED },
      });
    });

    it('should restrict quick mode to the first pages and fields (scenario E)', async () => {
      const contract = pdfDocument('msa.pdf', MASTER_SERVICES_PAGES);
      const quick = await runJob([contract], JobMode.QUICK);
      const full = await runJob([contract], JobMode.FULL);

      expect(quick.cells.map((cell) => cell.fieldKey)).toEqual([
        'effective_date_term',
        'governing_law',
        'contract_value',
        'termination_notice',
        'renewal_term',
      ]);
      expect(cellFor(quick.cells, 'msa.pdf', 'renewal_term').reviewState).toBe(ReviewState.MISSING_DATA);
      expect(quick.cells.some((cell) => cell.fieldKey === 'audit_rights')).toBe(false);

      const audit = cellFor(full.cells, 'msa.pdf', 'audit_rights');
      expect(audit.reviewState).toBe(ReviewState.EXTRACTED);
      expect(audit.value).toBe('Customer may audit once per year');
      expect(audit.citation?.location).toBe(5);
      expect(cellFor(full.cells, 'msa.pdf', 'renewal_term').value).toBe('one-year');
    });
  });

  describe('pipeline properties', () => {
    it('should produce identical cells when rerun', async () => {
      const documents = [
        pdfDocument('msa.pdf', MASTER_SERVICES_PAGES),
        htmlDocument('a.html', SCENARIO_A_HTML),
        htmlDocument('b.html', SCENARIO_B_HTML),
      ];
      const first = await runJob(documents, JobMode.FULL);
      const second = await runJob(documents, JobMode.FULL);

      expect(second.cells.map(comparable)).toEqual(first.cells.map(comparable));
    });

    it('should order cells by field declaration, then document ingestion', async () => {
      const { job, cells } = await runJob(
        [htmlDocument('b.html', SCENARIO_B_HTML), htmlDocument('a.html', SCENARIO_A_HTML)],
        JobMode.FULL
      );

      expect(job.documents.map((document) => document.identifier)).toEqual(['b.html', 'a.html']);
      expect(cells).toHaveLength(14);
      expect(cells.slice(0, 4).map((cell) => [cell.fieldKey, cell.documentIdentifier])).toEqual([
        ['effective_date_term', 'b.html'],
        ['effective_date_term', 'a.html'],
        ['governing_law', 'b.html'],
        ['governing_law', 'a.html'],
      ]);
    });

    it('should keep confidence in bounds and zero only for unmatched cells', async () => {
      const { cells } = await runJob(
        [pdfDocument('msa.pdf', MASTER_SERVICES_PAGES), htmlDocument('a.html', SCENARIO_A_HTML)],
        JobMode.FULL
      );

      for (const cell of cells) {
        expect(cell.confidence).toBeGreaterThanOrEqual(0);
        expect(cell.confidence).toBeLessThanOrEqual(1);
        const unmatched =
          cell.reviewState === ReviewState.MISSING_DATA &&
          cell.confidenceReasons.length === 1 &&
          cell.confidenceReasons[0] === ReasonCode.NO_MATCH;
        expect(cell.confidence === 0).toBe(unmatched);
        expect(cell.citation === null).toBe(cell.reviewState === ReviewState.MISSING_DATA);
      }
    });

    it('should match the full-mode cell inside the quick-mode slice', async () => {
      const contract = pdfDocument('msa.pdf', MASTER_SERVICES_PAGES);
      const quick = await runJob([contract], JobMode.QUICK);
      const full = await runJob([contract], JobMode.FULL);

      for (const key of ['effective_date_term', 'governing_law', 'contract_value', 'termination_notice']) {
        expect(comparable(cellFor(quick.cells, 'msa.pdf', key))).toEqual(
          comparable(cellFor(full.cells, 'msa.pdf', key))
        );
      }
      expect(cellFor(quick.cells, 'msa.pdf', 'contract_value')).toMatchObject({
        value: '$12,500.00',
        valueNormalized: '$12500.00',
      });
      expect(cellFor(quick.cells, 'msa.pdf', 'effective_date_term').citation).toMatchObject({
        locationType: LocationType.PAGE,
        location: 1,
        charStart: 60,
        charEnd: 73,
      });
    });

    it('should process only the first document in quick mode', async () => {
      const { job, cells } = await runJob(
        [htmlDocument('a.html', SCENARIO_A_HTML), htmlDocument('b.html', SCENARIO_B_HTML)],
        JobMode.QUICK
      );

      expect(job.documents.map((document) => document.identifier)).toEqual(['a.html']);
      expect(new Set(cells.map((cell) => cell.documentIdentifier))).toEqual(new Set(['a.html']));
      expect(job.fields).toHaveLength(5);
    });

    it('should write one creation audit entry per cell', async () => {
      const { cells, repository } = await runJob([htmlDocument('a.html', SCENARIO_A_HTML)], JobMode.FULL);

      for (const cell of cells) {
        const log = await repository.listAudit(cell.cellId);
        expect(log).toHaveLength(1);
        expect(log[0]).toMatchObject({ sequence: 1, action: 'CREATED', actor: 'system', before: null });
      }
    });
  });

  describe('quick-mode segment slice', () => {
    it('should keep the first three pages and every section', () => {
      const page = (location: number) => ({
        locationType: LocationType.PAGE,
        location,
        text: '',
        startOffset: 0,
        endOffset: 0,
      });
      const section = { ...page(7), locationType: LocationType.SECTION };

      expect(selectSegments(JobMode.QUICK, [1, 2, 3, 4, 5].map(page)).map((s) => s.location)).toEqual([1, 2, 3]);
      expect(selectSegments(JobMode.QUICK, [section])).toEqual([section]);
      expect(selectSegments(JobMode.FULL, [1, 2, 3, 4].map(page))).toHaveLength(4);
    });
  });

  describe('failures', () => {
    it('should turn an unreadable document into PARSE_ERROR cells and keep going', async () => {
      const { job, cells } = await runJob(
        [corruptPdfDocument('broken.pdf'), htmlDocument('a.html', SCENARIO_A_HTML)],
        JobMode.FULL
      );

      expect(job.status).toBe(JobStatus.SUCCEEDED);
      expect(job.errors).toEqual([
        {
          documentId: 'doc-broken.pdf',
          documentIdentifier: 'broken.pdf',
          code: ReasonCode.PARSE_ERROR,
          message: 'broken.pdf could not be parsed: Invalid PDF structure',
        },
      ]);

      const broken = cells.filter((cell) => cell.documentIdentifier === 'broken.pdf');
      expect(broken).toHaveLength(7);
      for (const cell of broken) {
        expect(cell).toMatchObject({
          reviewState: ReviewState.MISSING_DATA,
          confidence: 0,
          confidenceReasons: [ReasonCode.PARSE_ERROR],
          citation: null,
        });
      }
      expect(cellFor(cells, 'a.html', 'effective_date_term').reviewState).toBe(ReviewState.EXTRACTED);
    });

    it('should turn a failing field into an EXTRACTION_ERROR cell', async () => {
      const normalizeParts = jest.spyOn(normalizers, 'normalizeParts').mockImplementation(() => {
        throw new Error('normalizer crashed');
      });
      const { job, cells } = await runJob([htmlDocument('a.html', SCENARIO_A_HTML)], JobMode.FULL);
      normalizeParts.mockRestore();

      expect(job.status).toBe(JobStatus.SUCCEEDED);
      expect(job.errors).toEqual([
        {
          documentId: 'doc-a.html',
          documentIdentifier: 'a.html',
          fieldKey: 'effective_date_term',
          code: ReasonCode.EXTRACTION_ERROR,
          message: 'effective_date_term: normalizer crashed',
        },
      ]);
      expect(cellFor(cells, 'a.html', 'effective_date_term')).toMatchObject({
        reviewState: ReviewState.MISSING_DATA,
        confidence: 0,
        confidenceReasons: [ReasonCode.EXTRACTION_ERROR],
      });
      expect(cellFor(cells, 'a.html', 'governing_law').confidenceReasons).toEqual([ReasonCode.NO_MATCH]);
    });

    it('should fail the job when there is nothing to process', async () => {
      const { job, cells } = await runJob([], JobMode.FULL);

      expect(job.status).toBe(JobStatus.FAILED);
      expect(job.error).toBe('No documents available to process');
      expect(job.finishedAt).toBeDefined();
      expect(cells).toEqual([]);
    });

    it('should fail the job when the template cannot be loaded', async () => {
      const { service, repository } = createService([htmlDocument('a.html', SCENARIO_A_HTML)]);
      const handle = await service.submit(JobMode.FULL, {
        templatePath: path.join(__dirname, 'fixtures', 'invalid.template.json'),
      });
      const job: Job = await handle.done;

      expect(job.status).toBe(JobStatus.FAILED);
      expect(job.error?.startsWith('Template file is not valid JSON')).toBe(true);
      expect((await repository.load(job.id))?.cells).toEqual([]);
    });
  });

  describe('job accessors', () => {
    it('should report PENDING until the run starts, then the terminal status', async () => {
      const { service } = createService([htmlDocument('a.html', SCENARIO_A_HTML)]);

      const handle = await service.submit(JobMode.QUICK);
      expect(await service.status(handle.jobId)).toBe(JobStatus.PENDING);

      const job = await service.wait(handle.jobId);
      expect(job.status).toBe(JobStatus.SUCCEEDED);
      expect(await service.status(handle.jobId)).toBe(JobStatus.SUCCEEDED);
      expect((await service.wait(handle.jobId)).id).toBe(handle.jobId);
    });

    it('should group result rows by field in template order', async () => {
      const { job, service } = await runJob(
        [htmlDocument('a.html', SCENARIO_A_HTML), htmlDocument('b.html', SCENARIO_B_HTML)],
        JobMode.FULL
      );

      const table = await service.result(job.id);
      expect(table.job?.status).toBe(JobStatus.SUCCEEDED);
      expect(table.documents.map((document) => document.identifier)).toEqual(['a.html', 'b.html']);
      expect(table.fields.map((field) => field.field_key)).toEqual(table.rows.map((row) => row.field_key));
      expect(table.rows).toHaveLength(7);

      const [first] = table.rows;
      expect(first.field_key).toBe('effective_date_term');
      expect(first.cells.map((cell) => cell.document_identifier)).toEqual(['a.html', 'b.html']);
      expect(first.cells[0]).toMatchObject({
        field_key: 'effective_date_term',
        value: 'January 1, 2023',
        value_raw: 'January 1, 2023',
        value_normalized: '2023-01-01',
        review_state: 'EXTRACTED',
        confidence: 0.95,
        confidence_reasons: ['SINGLE_MATCH'],
        version: 1,
        citation: {
          document_id: 'doc-a.html',
          document_identifier: 'a.html',
          location_type: 'section',
          location: 1,
          char_start: 34,
          char_end: 49,
          coordinates: null,
        },
      });
    });

    it('should default the result to the latest succeeded job', async () => {
      const { service } = createService([htmlDocument('a.html', SCENARIO_A_HTML)]);
      expect(await service.result()).toEqual({ job: null, documents: [], fields: [], rows: [] });

      const handle = await service.submit(JobMode.QUICK);
      await handle.done;

      expect((await service.result()).job?.id).toBe(handle.jobId);
    });

    it('should fail with NotFoundError for an unknown job', async () => {
      const { service } = createService([]);

      await expect(service.getJob('missing')).rejects.toThrow('Job missing not found');
      await expect(service.result('missing')).rejects.toThrow('Job missing not found');
    });
  });
});
