import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { ElexonClient } from './services/elexon';
import { logger } from './utils/logger';

const startServer = async () => {
  const config = loadConfig();
  logger.configure({
    logDir: config.logging.dir,
    enableFile: config.logging.toFile,
    minLevel: config.logging.level
  });

  const app = createApp(new ElexonClient(config.elexon));

  const server = await new Promise<ReturnType<typeof app.listen>>(resolve => {
    const listening = app.listen(config.port, '0.0.0.0', () => {
      logger.info(`Server started on port ${config.port}`, { module: 'server' });
      resolve(listening);
    });
  });

  process.on('SIGTERM', () => {
    logger.info('Shutting down', { module: 'server' });
    server.close(() => logger.close());
  });
};

startServer().catch(error => {
  if (error instanceof Error) {
    logger.logError(error, { module: 'server' });
  }
  console.error('Failed to start server:', error);
  process.exit(1);
});
