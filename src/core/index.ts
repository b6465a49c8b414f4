// Migration core module
export * from './interfaces';
export * from './constants';
export * from './errors';
export * from './logger';
export * from './error-handler';
export * from './retry-utility';
export * from './migration-orchestrator';
