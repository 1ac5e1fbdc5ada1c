import mongoose from 'mongoose';
import logger from '../utils/logger';

const MAX_RETRIES = 5;
const RETRY_DELAY = 5000;

const connectDB = async (uri: string): Promise<void> => {
  let retries = MAX_RETRIES;

  while (retries > 0) {
    try {
      await mongoose.connect(uri, {
        serverSelectionTimeoutMS: 5000,
      });
      logger.info(`MongoDB Connected: ${mongoose.connection.host}`);
      return;
    } catch (error: unknown) {
      retries -= 1;
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`MongoDB connection failed. Retries left: ${retries}. Error: ${message}`);
      if (retries === 0) {
        throw new Error('All MongoDB connection retries exhausted');
      }
      logger.info(`Retrying in ${RETRY_DELAY / 1000} seconds...`);
      await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY));
    }
  }
};

export default connectDB;
