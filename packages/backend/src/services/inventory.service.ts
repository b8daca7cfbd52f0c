import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { FILE_EXTENSION_TO_FORMAT, DocumentFormat } from '../config/constants';
import { IngestedDocument } from '../types/document.types';

/** Ingestion collaborator: supplies documents in ingestion order */
export interface DocumentSource {
  listDocuments(): Promise<IngestedDocument[]>;
}

export interface DocumentFileInfo {
  id: string;
  identifier: string;
  path: string;
  source: 'data' | 'upload';
  format: DocumentFormat;
}

export function buildDocumentId(filePath: string): string {
  return crypto.createHash('sha1').update(path.resolve(filePath)).digest('hex').slice(0, 16);
}

export function formatForFile(fileName: string): DocumentFormat | null {
  const ext = path.extname(fileName).toLowerCase().slice(1);
  return FILE_EXTENSION_TO_FORMAT[ext] ?? null;
}

async function scanDirectory(dirPath: string, source: DocumentFileInfo['source']): Promise<DocumentFileInfo[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dirPath);
  } catch {
    return [];
  }

  const files: DocumentFileInfo[] = [];
  for (const entry of entries.sort()) {
    const format = formatForFile(entry);
    if (!format) continue;

    const filePath = path.join(dirPath, entry);
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) continue;

    files.push({
      id: buildDocumentId(filePath),
      identifier: entry,
      path: path.resolve(filePath),
      source,
      format,
    });
  }
  return files;
}

/**
 * Serves the PDF and HTML files found directly inside the data directory,
 * then those in the upload directory, each group ordered by file name.
 */
export class DirectoryDocumentSource implements DocumentSource {
  constructor(
    private readonly dataDir: string,
    private readonly uploadDir: string
  ) {}

  async listFiles(): Promise<DocumentFileInfo[]> {
    const dataFiles = await scanDirectory(this.dataDir, 'data');
    const uploadFiles = await scanDirectory(this.uploadDir, 'upload');
    return [...dataFiles, ...uploadFiles];
  }

  async listDocuments(): Promise<IngestedDocument[]> {
    const files = await this.listFiles();
    return Promise.all(
      files.map(async (file) => ({
        id: file.id,
        identifier: file.identifier,
        format: file.format,
        rawBytes: await fs.readFile(file.path),
      }))
    );
  }
}
