import { Router } from 'express';
import { exportController } from '../controllers/export.controller';

const router = Router();

// POST /api/exports/csv - { job_id? }
router.post('/csv', (req, res, next) =>
  exportController.downloadCsv(req, res, next)
);

// POST /api/exports/xlsx - { job_id? }
router.post('/xlsx', (req, res, next) =>
  exportController.downloadXlsx(req, res, next)
);

export default router;
