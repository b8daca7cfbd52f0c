import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

export async function initializeDataDirectories(): Promise<void> {
  const dirs = [
    config.dataDir,
    config.uploadDir,
    config.jobsDir,
    config.exportsDir,
  ];

  for (const dir of dirs) {
    await ensureDirectoryExists(dir);
  }
}

/** Writes beside the target and renames over it, so readers never see a partial file */
export async function saveJsonFile<T>(filePath: string, data: T): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDirectoryExists(dir);

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Returns null when the file is missing or holds invalid JSON */
export async function readJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

export async function listJsonFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath);
    return entries.filter((entry) => entry.endsWith('.json')).sort();
  } catch {
    return [];
  }
}

export async function saveBinaryFile(filePath: string, data: Buffer | string): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  await fs.writeFile(filePath, data);
}
