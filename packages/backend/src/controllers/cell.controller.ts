import { Request, Response, NextFunction } from 'express';
import { reviewService } from '../services/engine';
import { parseReviewAction } from '../services/review.service';
import { toAuditRecord, toCellRecord } from '../services/result.service';

export class CellController {
  async reviewCell(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const action = parseReviewAction(req.body);
      const { cell, audit } = await reviewService.applyReviewAction(req.params.cellId, action);

      res.json({
        success: true,
        data: {
          cell: toCellRecord(cell),
          audit: toAuditRecord(audit),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  async getAuditLog(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const logs = await reviewService.getAuditLog(req.params.cellId);
      res.json({
        success: true,
        data: { logs: logs.map(toAuditRecord) },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const cellController = new CellController();
