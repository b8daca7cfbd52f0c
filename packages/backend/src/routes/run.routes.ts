import { Router } from 'express';
import { runController } from '../controllers/run.controller';

const router = Router();

// POST /api/runs - Submit an extraction job { mode, wait, template_path }
router.post('/', (req, res, next) =>
  runController.startRun(req, res, next)
);

export default router;
