// SharePoint service module
export * from './types';
export * from './api-client';
export * from './upload-orchestrator';
