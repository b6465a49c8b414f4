// Freshdesk service module
export * from './types';
export * from './api-client';
export * from './ticket-mapper';
export * from './ticket-retriever';
export * from './attachment-downloader';
