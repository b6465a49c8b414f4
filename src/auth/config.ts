import { FreshdeskAuthConfig, SharePointAuthConfig } from './types';
import { ConfigValidationResult } from '../types';
import { FRESHDESK_LIMITS } from '../core/constants';

/**
 * Create Freshdesk configuration from a domain given as "acme",
 * "acme.freshdesk.com" or "https://acme.freshdesk.com/"
 */
export function createFreshdeskConfig(domain: string, apiKey: string): FreshdeskAuthConfig {
  let host = domain.trim().replace(/^https?:\/\//i, '').replace(/\/.*$/, '');
  if (host && !host.includes('.')) {
    host = `${host}.freshdesk.com`;
  }

  return {
    domain: host,
    baseUrl: `https://${host}`,
    apiKey,
  };
}

export function createSharePointConfig(siteUrl: string, username: string, password: string): SharePointAuthConfig {
  return {
    siteUrl: siteUrl.trim().replace(/\/+$/, ''),
    username,
    password,
  };
}

export function validateFreshdeskConfig(config: Partial<FreshdeskAuthConfig>): ConfigValidationResult {
  const errors: string[] = [];

  if (!config.domain) {
    errors.push('Freshdesk domain is required: use --domain or set FRESHDESK_DOMAIN');
  } else if (!/^[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/.test(config.domain)) {
    errors.push(`Invalid Freshdesk domain "${config.domain}". Use a host like "acme.freshdesk.com"`);
  }

  if (!config.apiKey) {
    errors.push('Freshdesk API key is required: use --api-key or set FRESHDESK_API_KEY');
  }

  return { isValid: errors.length === 0, errors };
}

export function validateSharePointConfig(config: Partial<SharePointAuthConfig>): ConfigValidationResult {
  const errors: string[] = [];

  if (!config.siteUrl) {
    errors.push('SharePoint site URL is required: use --site-url or set SHAREPOINT_SITE_URL');
  } else {
    try {
      const url = new URL(config.siteUrl);
      if (url.protocol !== 'https:') {
        errors.push('SharePoint site URL must use https');
      }
    } catch {
      errors.push(`Invalid SharePoint site URL "${config.siteUrl}"`);
    }
  }

  if (!config.username) {
    errors.push('SharePoint username is required: use --username or set SHAREPOINT_USERNAME');
  }
  if (!config.password) {
    errors.push('SharePoint password is required: use --password or set SHAREPOINT_PASSWORD');
  }

  return { isValid: errors.length === 0, errors };
}

export interface MigrationSettings {
  freshdesk: Partial<FreshdeskAuthConfig>;
  sharepoint: Partial<SharePointAuthConfig>;
  sharePointFolder?: string;
  pageSize?: number;
}

/**
 * Validate everything a full run needs before it touches either system
 */
export function validateMigrationConfig(settings: MigrationSettings): ConfigValidationResult {
  const errors = [
    ...validateFreshdeskConfig(settings.freshdesk).errors,
    ...validateSharePointConfig(settings.sharepoint).errors,
  ];

  if (settings.sharePointFolder !== undefined && !settings.sharePointFolder.replace(/\//g, '').trim()) {
    errors.push('SharePoint folder must not be empty');
  }

  if (
    settings.pageSize !== undefined &&
    (!Number.isInteger(settings.pageSize) || settings.pageSize < 1 || settings.pageSize > FRESHDESK_LIMITS.MAX_PAGE_SIZE)
  ) {
    errors.push(`Page size must be an integer between 1 and ${FRESHDESK_LIMITS.MAX_PAGE_SIZE}`);
  }

  return { isValid: errors.length === 0, errors };
}
