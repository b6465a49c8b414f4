import { ISharePointAuthenticator, SharePointAuthConfig, SharePointSession } from './types';
import { Logger } from '../types';
import { API_ENDPOINTS, USER_AGENT } from '../core/constants';
import { AuthenticationError, errorFromResponse, networkError } from '../core/errors';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * WS-Trust issue request for the SharePoint Online security token service
 */
export function buildSamlRequest(username: string, password: string, endpoint: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<s:Envelope xmlns:s="http://www.w3.org/2003/05/soap-envelope" xmlns:a="http://www.w3.org/2005/08/addressing" xmlns:u="http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-utility-1.0.xsd">
  <s:Header>
    <a:Action s:mustUnderstand="1">http://schemas.xmlsoap.org/ws/2005/02/trust/RST/Issue</a:Action>
    <a:ReplyTo><a:Address>http://www.w3.org/2005/08/addressing/anonymous</a:Address></a:ReplyTo>
    <a:To s:mustUnderstand="1">${API_ENDPOINTS.SHAREPOINT.STS_URL}</a:To>
    <o:Security s:mustUnderstand="1" xmlns:o="http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-secext-1.0.xsd">
      <o:UsernameToken>
        <o:Username>${escapeXml(username)}</o:Username>
        <o:Password>${escapeXml(password)}</o:Password>
      </o:UsernameToken>
    </o:Security>
  </s:Header>
  <s:Body>
    <t:RequestSecurityToken xmlns:t="http://schemas.xmlsoap.org/ws/2005/02/trust">
      <wsp:AppliesTo xmlns:wsp="http://schemas.xmlsoap.org/ws/2004/09/policy">
        <a:EndpointReference><a:Address>${escapeXml(endpoint)}</a:Address></a:EndpointReference>
      </wsp:AppliesTo>
      <t:KeyType>http://schemas.xmlsoap.org/ws/2005/05/identity/NoProofKey</t:KeyType>
      <t:RequestType>http://schemas.xmlsoap.org/ws/2005/02/trust/Issue</t:RequestType>
      <t:TokenType>urn:oasis:names:tc:SAML:1.0:assertion</t:TokenType>
    </t:RequestSecurityToken>
  </s:Body>
</s:Envelope>`;
}

/**
 * Pull the binary security token out of an STS response, or explain the fault
 */
export function extractSecurityToken(responseXml: string): string {
  const token = /<wsse:BinarySecurityToken[^>]*>([^<]+)<\/wsse:BinarySecurityToken>/.exec(responseXml);
  if (token) {
    return token[1].replace(/&amp;/g, '&');
  }

  const reason = /<psf:text>([^<]+)<\/psf:text>/.exec(responseXml) ?? /<S:Text[^>]*>([^<]+)<\/S:Text>/.exec(responseXml);
  throw new AuthenticationError(
    `SharePoint sign-in rejected: ${reason ? reason[1] : 'no security token in STS response'}`
  );
}

/**
 * Build a Cookie header from the FedAuth and rtFa cookies set by the sign-in page
 */
export function parseAuthCookies(setCookieHeader: string | null): string {
  const cookies = new Map<string, string>();
  const pattern = /(FedAuth|rtFa)=([^;,\s]+)/g;

  for (const match of (setCookieHeader ?? '').matchAll(pattern)) {
    cookies.set(match[1], match[2]);
  }

  if (!cookies.has('FedAuth') || !cookies.has('rtFa')) {
    throw new AuthenticationError('SharePoint sign-in did not return FedAuth and rtFa cookies');
  }

  return Array.from(cookies, ([name, value]) => `${name}=${value}`).join('; ');
}

interface ContextInfo {
  FormDigestValue: string;
  FormDigestTimeoutSeconds: number;
}

function isContextInfo(value: unknown): value is ContextInfo {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const digest: unknown = Reflect.get(value, 'FormDigestValue');
  const timeout: unknown = Reflect.get(value, 'FormDigestTimeoutSeconds');
  return typeof digest === 'string' && typeof timeout === 'number';
}

/**
 * Signs in to SharePoint Online with a user name and password: STS token,
 * then sign-in cookies, then a request digest for write calls.
 */
export class SharePointAuthenticator implements ISharePointAuthenticator {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async authenticate(config: SharePointAuthConfig): Promise<SharePointSession> {
    const origin = new URL(config.siteUrl).origin;

    this.logger.debug(`Requesting security token for ${origin}`);
    const token = await this.requestSecurityToken(config, origin);

    const cookieHeader = await this.signIn(origin, token);
    this.logger.debug('Obtained SharePoint sign-in cookies');

    const session = await this.fetchContextInfo(config.siteUrl, cookieHeader);
    this.logger.info(`Authenticated to SharePoint site ${config.siteUrl} as ${config.username}`);
    return session;
  }

  async refreshDigest(config: SharePointAuthConfig, session: SharePointSession): Promise<SharePointSession> {
    this.logger.debug('Refreshing SharePoint form digest');
    return this.fetchContextInfo(config.siteUrl, session.cookieHeader);
  }

  private async requestSecurityToken(config: SharePointAuthConfig, origin: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(API_ENDPOINTS.SHAREPOINT.STS_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/soap+xml; charset=utf-8',
          'User-Agent': USER_AGENT,
        },
        body: buildSamlRequest(config.username, config.password, origin),
      });
    } catch (error) {
      throw networkError('sharepoint', 'security token request', error);
    }

    const body = await response.text();
    if (!response.ok && !body.includes('<psf:text>')) {
      throw errorFromResponse('sharepoint', response.status, body, null, 'security token request');
    }

    return extractSecurityToken(body);
  }

  private async signIn(origin: string, token: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${origin}${API_ENDPOINTS.SHAREPOINT.SIGN_IN}`, {
        method: 'POST',
        redirect: 'manual',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': USER_AGENT,
        },
        body: token,
      });
    } catch (error) {
      throw networkError('sharepoint', 'sign-in', error);
    }

    if (response.status >= 400) {
      throw errorFromResponse('sharepoint', response.status, await response.text(), null, 'sign-in');
    }

    return parseAuthCookies(response.headers.get('set-cookie'));
  }

  private async fetchContextInfo(siteUrl: string, cookieHeader: string): Promise<SharePointSession> {
    let response: Response;
    try {
      response = await fetch(`${siteUrl}${API_ENDPOINTS.SHAREPOINT.CONTEXT_INFO}`, {
        method: 'POST',
        headers: {
          Accept: 'application/json;odata=nometadata',
          Cookie: cookieHeader,
          'User-Agent': USER_AGENT,
        },
      });
    } catch (error) {
      throw networkError('sharepoint', 'context info request', error);
    }

    if (!response.ok) {
      throw errorFromResponse(
        'sharepoint',
        response.status,
        await response.text(),
        response.headers.get('Retry-After'),
        'context info request'
      );
    }

    const info: unknown = await response.json();
    if (!isContextInfo(info)) {
      throw new AuthenticationError('SharePoint context info response did not contain a form digest');
    }

    return {
      cookieHeader,
      formDigest: info.FormDigestValue,
      digestExpiresAt: new Date(Date.now() + info.FormDigestTimeoutSeconds * 1000),
    };
  }
}
