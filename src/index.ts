// Main entry point for the migration library

export * from './types';
export * from './core';
export * from './auth/config';
export * from './auth/sharepoint-auth';
export * from './services/freshdesk';
export * from './services/sharepoint';
export * from './services/local/path-utils';
export * from './services/local/snapshot-store';
export * from './progress';

export type { FreshdeskAuthConfig, SharePointAuthConfig, SharePointSession, ISharePointAuthenticator } from './auth/types';
