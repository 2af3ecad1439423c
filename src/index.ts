// Library entry point

export * from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel, type LoggerConfig } from './core/logger.js';
export { validateGenerationForm, validateRoadmapId } from './core/validation.js';
export * from './models/index.js';
export * from './services/index.js';
export { createApp, startServer, type AppOptions, type RunningServer, type SubmissionHandler } from './server/index.js';
