import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  projectName: process.env.PROJECT_NAME || 'Catalog Cart API',
  version: process.env.APP_VERSION || '1.0.0',
  corsOrigins: parseCorsOrigins(),
};

export const paginationConfig = {
  defaultSkip: 0,
  defaultLimit: 100,
  maxLimit: 100,
};

export const loggingConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || './logs',
  // File transports stay off under test so Jest runs leave nothing behind
  toFile: (process.env.LOG_TO_FILE || 'true') === 'true' && appConfig.nodeEnv !== 'test',
  silent: appConfig.nodeEnv === 'test',
  rotation: '10MB',
  retention: '30d',
  compression: true,
};
