import { loadConfig } from './Config.js';

describe('loadConfig', () => {
  it('applies the development defaults for the Kerliix provider', () => {
    const config = loadConfig({ KERLIIX_CLIENT_ID: 'test-client', SESSION_SECRET: 'test-secret' });

    expect(config).toEqual({
      port: 5175,
      nodeEnv: 'development',
      frontendUrl: 'http://localhost:5176',
      session: {
        secret: 'test-secret',
        secretGenerated: false,
        maxAgeMs: undefined,
        secure: false,
      },
      pkceTtlMs: 600000,
      provider: {
        kind: 'kerliix',
        clientId: 'test-client',
        clientSecret: undefined,
        redirectUri: 'http://localhost:5175/callback',
        baseUrl: 'https://api.kerliix.com',
      },
    });
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      KERLIIX_CLIENT_ID: 'test-client',
      KERLIIX_CLIENT_SECRET: 'test-secret',
      KERLIIX_BASE_URL: 'https://auth.example.test',
      PORT: '8080',
      FRONTEND_URL: 'http://localhost:3000',
      SESSION_MAX_AGE_SECONDS: '3600',
      COOKIE_SECURE: 'true',
      PKCE_TTL_SECONDS: '60',
    });

    expect(config.port).toBe(8080);
    expect(config.frontendUrl).toBe('http://localhost:3000');
    expect(config.session.maxAgeMs).toBe(3600000);
    expect(config.session.secure).toBe(true);
    expect(config.pkceTtlMs).toBe(60000);
    expect(config.provider).toMatchObject({ clientSecret: 'test-secret', baseUrl: 'https://auth.example.test' });
  });

  it('falls back to the defaults for variables left empty', () => {
    const config = loadConfig({
      KERLIIX_CLIENT_ID: 'test-client',
      OAUTH_PROVIDER: '',
      PORT: '',
      NODE_ENV: '',
      FRONTEND_URL: '',
      COOKIE_SECURE: '',
      PKCE_TTL_SECONDS: '',
      KERLIIX_REDIRECT_URI: '',
      KERLIIX_BASE_URL: '',
      ENTRA_REDIRECT_URI: '',
    });

    expect(config.port).toBe(5175);
    expect(config.nodeEnv).toBe('development');
    expect(config.frontendUrl).toBe('http://localhost:5176');
    expect(config.session.secure).toBe(false);
    expect(config.pkceTtlMs).toBe(600000);
    expect(config.provider).toEqual({
      kind: 'kerliix',
      clientId: 'test-client',
      clientSecret: undefined,
      redirectUri: 'http://localhost:5175/callback',
      baseUrl: 'https://api.kerliix.com',
    });
  });

  it('falls back to the default Entra ID redirect URI when it is empty', () => {
    const config = loadConfig({
      OAUTH_PROVIDER: 'entra',
      ENTRA_TENANT_ID: 'test-tenant',
      ENTRA_CLIENT_ID: 'test-client',
      ENTRA_CLIENT_SECRET: 'test-secret',
      ENTRA_REDIRECT_URI: '',
    });

    expect(config.provider).toMatchObject({ kind: 'entra', redirectUri: 'http://localhost:5175/callback' });
  });

  it('generates a session secret when none is configured', () => {
    const first = loadConfig({ KERLIIX_CLIENT_ID: 'test-client' });
    const second = loadConfig({ KERLIIX_CLIENT_ID: 'test-client', SESSION_SECRET: '' });

    expect(first.session.secretGenerated).toBe(true);
    expect(second.session.secretGenerated).toBe(true);
    expect(first.session.secret).toHaveLength(43);
    expect(first.session.secret).not.toBe(second.session.secret);
  });

  it('requires the Kerliix client id', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variables: KERLIIX_CLIENT_ID');
    expect(() => loadConfig({ KERLIIX_CLIENT_ID: '' }))
      .toThrow('Missing required environment variables: KERLIIX_CLIENT_ID');
  });

  it('lists every missing Entra ID variable', () => {
    expect(() => loadConfig({ OAUTH_PROVIDER: 'entra', ENTRA_CLIENT_ID: 'test-client' }))
      .toThrow('Missing required environment variables: ENTRA_TENANT_ID, ENTRA_CLIENT_SECRET');
  });

  it('builds Entra ID settings', () => {
    const config = loadConfig({
      OAUTH_PROVIDER: 'entra',
      ENTRA_TENANT_ID: 'test-tenant',
      ENTRA_CLIENT_ID: 'test-client',
      ENTRA_CLIENT_SECRET: 'test-secret',
    });

    expect(config.provider).toEqual({
      kind: 'entra',
      tenantId: 'test-tenant',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost:5175/callback',
    });
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ KERLIIX_CLIENT_ID: 'test-client', PORT: 'eighty' }))
      .toThrow(/^Invalid environment configuration: PORT: /);
    expect(() => loadConfig({ KERLIIX_CLIENT_ID: 'test-client', OAUTH_PROVIDER: 'github' }))
      .toThrow(/^Invalid environment configuration: OAUTH_PROVIDER: /);
  });
});
