import { config } from '../config';
import { DirectoryDocumentSource } from './inventory.service';
import { JobService } from './job.service';
import { ReviewService } from './review.service';
import { ExportService } from './export.service';
import { JsonFileReviewRepository } from './repository/jsonFile.repository';

// Service singletons wired against the configured data directory

export const reviewRepository = new JsonFileReviewRepository(config.jobsDir);
export const documentSource = new DirectoryDocumentSource(config.dataDir, config.uploadDir);

export const jobService = new JobService({
  repository: reviewRepository,
  documentSource,
  templatePath: config.templatePath,
});

export const reviewService = new ReviewService(reviewRepository);
export const exportService = new ExportService(jobService, config.exportsDir);
