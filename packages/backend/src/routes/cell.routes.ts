import { Router } from 'express';
import { cellController } from '../controllers/cell.controller';

const router = Router();

// PATCH /api/cells/:cellId - Apply a review action
router.patch('/:cellId', (req, res, next) =>
  cellController.reviewCell(req, res, next)
);

// GET /api/cells/:cellId/audit - Audit log, oldest first
router.get('/:cellId/audit', (req, res, next) =>
  cellController.getAuditLog(req, res, next)
);

export default router;
