export {
  type LogLevel,
  type LogContext,
  type Logger,
  createLogger,
  logger,
} from "./logger.js";

export {
  type ErrorOptions,
  AppError,
  NotFoundError,
  ValidationError,
  ConfigurationError,
  ExternalServiceError,
  PersistenceError,
  errorMessage,
} from "./errors.js";

export {
  getRequiredEnv,
  getOptionalEnv,
  getDatabaseUrl,
  isProduction,
  isDevelopment,
  parseEnvInt,
  parseEnvFloat,
  parseEnvBool,
} from "./env.js";

export { getPool, getPoolStatus, closePool, type PoolStatus } from "./pool.js";

export { ParamBuilder } from "./paramBuilder.js";
