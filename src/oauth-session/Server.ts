import 'dotenv/config';
import { createApp } from "./App.js";
import { loadConfig } from "./Config.js";
import { logger } from "./Logger.js";
import { createOAuthClient } from "./auth/OAuthClientFactory.js";

const SWEEP_INTERVAL_MS = 60000;

function main(): void {
  const config = loadConfig();

  if (config.session.secretGenerated) {
    logger.warn('SESSION_SECRET is not set: using a random secret, sessions will not survive a restart');
  }

  const oauthClient = createOAuthClient(config.provider);
  const { app, pkceStore, sessionStore } = createApp({ config, oauthClient });

  setInterval(() => {
    const expiredLogins = pkceStore.cleanExpired();
    const expiredSessions = sessionStore.cleanExpired();
    if (expiredLogins > 0 || expiredSessions > 0) {
      logger.debug('Swept expired entries', { expiredLogins, expiredSessions });
    }
  }, SWEEP_INTERVAL_MS).unref();

  app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`, {
      provider: oauthClient.name,
      frontendUrl: config.frontendUrl,
    });
    logger.warn('Sessions and PKCE verifiers are kept in memory: for local development only');
  });
}

try {
  main();
} catch (error) {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
