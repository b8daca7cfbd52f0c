import app from './app';
import { config } from './config';
import { loadTemplate } from './services/template.service';
import { initializeDataDirectories } from './utils/fileSystem';
import { TemplateError, errorMessage } from './utils/errors';

async function start(): Promise<void> {
  await initializeDataDirectories();

  try {
    const template = await loadTemplate(config.templatePath);
    console.log(`Template ${template.id}: ${template.fields.length} field(s)`);
  } catch (error) {
    if (error instanceof TemplateError) {
      console.error(`Invalid template at ${config.templatePath}: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running at http://localhost:${config.port}`);
    console.log(`📁 Data directory: ${config.dataDir}`);
    console.log(`📁 Environment: ${config.nodeEnv}`);
  });

  process.on('SIGTERM', () => {
    console.log('SIGTERM received. Shutting down gracefully...');
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  });
}

start().catch((error) => {
  console.error('Failed to start server:', errorMessage(error));
  process.exit(1);
});
