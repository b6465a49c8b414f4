// Authentication-specific types and interfaces

export interface FreshdeskAuthConfig {
  domain: string; // e.g., 'acme.freshdesk.com'
  baseUrl: string; // e.g., 'https://acme.freshdesk.com'
  apiKey: string;
}

export interface SharePointAuthConfig {
  siteUrl: string; // e.g., 'https://acme.sharepoint.com/sites/support'
  username: string;
  password: string;
}

export interface SharePointSession {
  cookieHeader: string;
  formDigest: string;
  digestExpiresAt: Date;
}

export interface ISharePointAuthenticator {
  authenticate(config: SharePointAuthConfig): Promise<SharePointSession>;
  refreshDigest(config: SharePointAuthConfig, session: SharePointSession): Promise<SharePointSession>;
}
