import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { JobMode } from '../config/constants';
import { jobService } from '../services/engine';
import { toJobRecord } from '../services/result.service';
import { ValidationError } from '../utils/errors';

const runRequestSchema = z.object({
  mode: z.nativeEnum(JobMode).default(JobMode.QUICK),
  wait: z.boolean().default(false),
  template_path: z.string().min(1).optional(),
});

export class RunController {
  async startRun(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const parsed = runRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
      }

      const { mode, wait, template_path } = parsed.data;
      const handle = await jobService.submit(mode, { templatePath: template_path });
      const job = wait ? await handle.done : await jobService.getJob(handle.jobId);

      res.status(wait ? 200 : 202).json({
        success: true,
        data: { job: toJobRecord(job) },
      });
    } catch (error) {
      next(error);
    }
  }

  async getJob(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const job = await jobService.getJob(req.params.jobId);
      res.json({
        success: true,
        data: { job: toJobRecord(job) },
      });
    } catch (error) {
      next(error);
    }
  }

  async getResultTable(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const jobId = typeof req.query.job_id === 'string' && req.query.job_id ? req.query.job_id : undefined;
      const table = await jobService.result(jobId);
      res.json({
        success: true,
        data: table,
      });
    } catch (error) {
      next(error);
    }
  }
}

export const runController = new RunController();
