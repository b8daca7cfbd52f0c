import { Router } from 'express';
import { uploadMiddleware } from '../middleware/upload.middleware';
import { uploadLimiter } from '../middleware/rateLimiter';
import { documentController } from '../controllers/document.controller';

const router = Router();

// GET /api/documents - Documents a run would process, in ingestion order
router.get('/', (req, res, next) =>
  documentController.listDocuments(req, res, next)
);

// POST /api/documents/upload - Upload a PDF or HTML document
router.post('/upload', uploadLimiter, uploadMiddleware.single('file'), (req, res, next) =>
  documentController.uploadDocument(req, res, next)
);

export default router;
