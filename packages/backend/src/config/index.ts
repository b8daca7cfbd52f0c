import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const dataDir = process.env.DATA_DIR
  ? path.resolve(process.env.DATA_DIR)
  : path.resolve(__dirname, '../../../../data');

export const config = {
  port: parseInt(process.env.PORT || '3020', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  dataDir,
  uploadDir: path.join(dataDir, 'uploads'),
  jobsDir: path.join(dataDir, 'jobs'),
  exportsDir: path.join(dataDir, 'exports'),
  templatePath: process.env.TEMPLATE_PATH
    ? path.resolve(process.env.TEMPLATE_PATH)
    : path.resolve(__dirname, '../../templates/default.template.json'),
  maxFileSize: 50 * 1024 * 1024, // 50MB
  allowedFileTypes: ['pdf', 'html', 'htm'],
};
