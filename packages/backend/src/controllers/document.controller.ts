import { Request, Response, NextFunction } from 'express';
import path from 'path';
import { documentSource } from '../services/engine';
import { createError } from '../middleware/errorHandler';

export class DocumentController {
  async listDocuments(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const files = await documentSource.listFiles();
      res.json({
        success: true,
        data: {
          documents: files.map((file) => ({
            id: file.id,
            identifier: file.identifier,
            source: file.source,
            format: file.format,
          })),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  async uploadDocument(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.file) {
        throw createError('No file was uploaded', 400);
      }

      const uploadedPath = path.resolve(req.file.path);
      const files = await documentSource.listFiles();
      const uploaded = files.find((file) => file.path === uploadedPath);
      console.log(`[Upload] Stored ${req.file.originalname}`);

      res.status(201).json({
        success: true,
        data: {
          document_id: uploaded?.id ?? null,
          identifier: uploaded?.identifier ?? req.file.filename,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const documentController = new DocumentController();
