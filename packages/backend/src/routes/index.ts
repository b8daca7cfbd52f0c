import { Router } from 'express';
import documentRoutes from './document.routes';
import runRoutes from './run.routes';
import cellRoutes from './cell.routes';
import exportRoutes from './export.routes';
import { runController } from '../controllers/run.controller';
import { runLimiter } from '../middleware/rateLimiter';

const router = Router();

router.use('/documents', documentRoutes);
router.use('/runs', runLimiter, runRoutes);
router.use('/cells', cellRoutes);
router.use('/exports', exportRoutes);

// GET /api/jobs/:jobId - Job status and error summary
router.get('/jobs/:jobId', (req, res, next) =>
  runController.getJob(req, res, next)
);

// GET /api/results/table?job_id= - Result table (latest succeeded job when omitted)
router.get('/results/table', (req, res, next) =>
  runController.getResultTable(req, res, next)
);

router.get('/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

export default router;
