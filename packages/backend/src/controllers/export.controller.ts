import { Request, Response, NextFunction } from 'express';
import { exportService } from '../services/engine';
import { ExportFormat } from '../services/export.service';

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export class ExportController {
  async downloadCsv(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.download('csv', req, res, next);
  }

  async downloadXlsx(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.download('xlsx', req, res, next);
  }

  private async download(format: ExportFormat, req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body: unknown = req.body;
      const jobId =
        typeof body === 'object' && body !== null && 'job_id' in body && typeof body.job_id === 'string'
          ? body.job_id
          : undefined;

      const file = await exportService.export(format, jobId);
      res.setHeader('Content-Type', CONTENT_TYPES[format]);
      res.download(file.filePath, file.fileName);
    } catch (error) {
      next(error);
    }
  }
}

export const exportController = new ExportController();
