import {
  SharePointAuthenticator,
  buildSamlRequest,
  extractSecurityToken,
  parseAuthCookies,
} from '../../auth/sharepoint-auth';
import { createSharePointConfig } from '../../auth/config';
import { AuthenticationError } from '../../core/errors';
import { RecordingLogger } from '../helpers/recording-logger';
import { jsonResponse, textResponse } from '../helpers/http';

const STS_FAULT = `<?xml version="1.0" encoding="utf-8"?>
<S:Envelope xmlns:S="http://www.w3.org/2003/05/soap-envelope">
  <S:Body>
    <S:Fault>
      <S:Code><S:Value>S:Sender</S:Value></S:Code>
      <S:Reason><S:Text xml:lang="en-US">Authentication Failure</S:Text></S:Reason>
      <S:Detail>
        <psf:error xmlns:psf="http://schemas.microsoft.com/Passport/SoapServices/SOAPFault">
          <psf:internalerror>
            <psf:code>0x80041012</psf:code>
            <psf:text>The entered and stored passwords do not match.</psf:text>
          </psf:internalerror>
        </psf:error>
      </S:Detail>
    </S:Fault>
  </S:Body>
</S:Envelope>`;

describe('SharePoint authentication', () => {
  const config = createSharePointConfig('https://contoso.sharepoint.com/sites/support', 'migration@contoso.com', 'test-password');

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildSamlRequest', () => {
    it('should escape credentials and address the site origin', () => {
      const xml = buildSamlRequest('a&b@contoso.com', 'p<ss>"1"', 'https://contoso.sharepoint.com');

      expect(xml).toContain('<o:Username>a&amp;b@contoso.com</o:Username>');
      expect(xml).toContain('<o:Password>p&lt;ss&gt;&quot;1&quot;</o:Password>');
      expect(xml).toContain('<a:Address>https://contoso.sharepoint.com</a:Address>');
    });
  });

  describe('extractSecurityToken', () => {
    it('should return the binary security token', () => {
      const xml =
        '<wst:RequestedSecurityToken><wsse:BinarySecurityToken Id="Compact0">t=test-token&amp;p=1</wsse:BinarySecurityToken></wst:RequestedSecurityToken>';

      expect(extractSecurityToken(xml)).toBe('t=test-token&p=1');
    });

    it('should explain a rejected sign-in', () => {
      expect(() => extractSecurityToken(STS_FAULT)).toThrow(
        new AuthenticationError('SharePoint sign-in rejected: The entered and stored passwords do not match.')
      );
    });

    it('should fall back to the SOAP reason text', () => {
      const xml = '<S:Fault><S:Reason><S:Text xml:lang="en-US">Authentication Failure</S:Text></S:Reason></S:Fault>';

      expect(() => extractSecurityToken(xml)).toThrow('SharePoint sign-in rejected: Authentication Failure');
    });
  });

  describe('parseAuthCookies', () => {
    it('should build a cookie header from FedAuth and rtFa', () => {
      const header =
        'FedAuth=test-fedauth; expires=Wed, 01 Jan 2031 00:00:00 GMT; path=/; secure; HttpOnly, rtFa=test-rtfa; domain=sharepoint.com; path=/; secure; HttpOnly';

      expect(parseAuthCookies(header)).toBe('FedAuth=test-fedauth; rtFa=test-rtfa');
    });

    it('should reject a response without both cookies', () => {
      expect(() => parseAuthCookies('rtFa=test-rtfa; path=/')).toThrow(AuthenticationError);
      expect(() => parseAuthCookies(null)).toThrow('SharePoint sign-in did not return FedAuth and rtFa cookies');
    });
  });

  describe('SharePointAuthenticator', () => {
    it('should fail with the STS reason before signing in', async () => {
      const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(textResponse(STS_FAULT, 500));
      const authenticator = new SharePointAuthenticator(new RecordingLogger());

      await expect(authenticator.authenticate(config)).rejects.toThrow(
        'SharePoint sign-in rejected: The entered and stored passwords do not match.'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('https://login.microsoftonline.com/extSTS.srf');
    });

    it('should refresh the form digest with the existing cookies', async () => {
      const fetchMock = jest
        .spyOn(global, 'fetch')
        .mockResolvedValue(jsonResponse({ FormDigestValue: '0xTESTDIGEST', FormDigestTimeoutSeconds: 1800 }));
      const authenticator = new SharePointAuthenticator(new RecordingLogger());
      const before = Date.now();

      const session = await authenticator.refreshDigest(config, {
        cookieHeader: 'FedAuth=test-fedauth; rtFa=test-rtfa',
        formDigest: 'stale',
        digestExpiresAt: new Date(before),
      });

      expect(session.formDigest).toBe('0xTESTDIGEST');
      expect(session.cookieHeader).toBe('FedAuth=test-fedauth; rtFa=test-rtfa');
      expect(session.digestExpiresAt.getTime()).toBeGreaterThanOrEqual(before + 1800 * 1000);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://contoso.sharepoint.com/sites/support/_api/contextinfo');
      expect(init?.method).toBe('POST');
      expect(new Headers(init?.headers).get('Cookie')).toBe('FedAuth=test-fedauth; rtFa=test-rtfa');
    });

    it('should reject a context info response without a digest', async () => {
      jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ WebFullUrl: config.siteUrl }));
      const authenticator = new SharePointAuthenticator(new RecordingLogger());

      await expect(
        authenticator.refreshDigest(config, {
          cookieHeader: 'FedAuth=test-fedauth; rtFa=test-rtfa',
          formDigest: 'stale',
          digestExpiresAt: new Date(),
        })
      ).rejects.toThrow(AuthenticationError);
    });
  });
});
