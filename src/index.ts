import { createApp } from './app';
import connectDB from './db/database';
import { createMongoRepositories } from './repositories/index';
import logger from './utils/logger';
import validateEnv from './utils/validateEnv';

const config = validateEnv();

const startServer = async (): Promise<void> => {
  try {
    await connectDB(config.MONGODB_URI);
    const app = createApp({ config, repositories: createMongoRepositories() });
    const server = app.listen(config.PORT, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : config.PORT;
      logger.info(`Server running in ${config.NODE_ENV} mode on port ${port}`);
    });
  } catch (error: unknown) {
    logger.error(
      'Failed to start server:',
      error instanceof Error ? error : String(error)
    );
    process.exit(1);
  }
};

void startServer();
