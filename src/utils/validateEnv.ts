import dotenv from 'dotenv';
import { cleanEnv, str, num, url } from 'envalid';
dotenv.config();

const validateEnv = () => {
  return cleanEnv(process.env, {
    NODE_ENV: str({ choices: ['development', 'test', 'production'] }),
    PORT: num({ default: 3000 }),
    MONGODB_URI: url(),
    LOG_LEVEL: str({
      choices: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      default: 'info',
    }),
    JWT_ACCESS_SECRET: str(),
    // Seconds
    JWT_ACCESS_TTL: num({ default: 60 * 60 }),
    UPLOADS_DIR: str({ default: 'uploads' }),
    FRONTEND_URL: url({ default: 'http://localhost:5173' }),
    ADMIN_USERNAME: str({ default: '' }),
    ADMIN_PASSWORD: str({ default: '' }),
  });
};

export type AppConfig = ReturnType<typeof validateEnv>;

export default validateEnv;
