// Export all services

export * from './config/config-service.js';
export * from './storage/index.js';
export * from './generation/index.js';
export * from './rendering/index.js';
export * from './orchestrator/index.js';
export * from './container.js';
