import mongoose from 'mongoose';
import connectDB from '../db/database';
import { Permission, UserRole } from '../model/user.model';
import { MongoUserRepository } from '../repositories/user.repository';
import validateEnv from '../utils/validateEnv';
import logger from '../utils/logger';

const config = validateEnv();

export const createAdminUser = async (): Promise<void> => {
  if (!config.ADMIN_USERNAME || !config.ADMIN_PASSWORD) {
    throw new Error('Set ADMIN_USERNAME and ADMIN_PASSWORD in the .env file.');
  }

  await connectDB(config.MONGODB_URI);
  logger.info('Connected to database');

  try {
    const users = new MongoUserRepository();

    if (await users.existsByUsername(config.ADMIN_USERNAME)) {
      logger.info('Admin user already exists');
      return;
    }

    const admin = await users.create({
      username: config.ADMIN_USERNAME,
      password: config.ADMIN_PASSWORD,
      role: UserRole.ADMIN,
      permissions: Object.values(Permission),
    });

    logger.info(`Admin user created with username: ${admin.username}`);
  } finally {
    await mongoose.disconnect();
  }
};

createAdminUser().catch((error: unknown) => {
  logger.error('Error creating admin user:', error instanceof Error ? error : String(error));
  process.exitCode = 1;
});
