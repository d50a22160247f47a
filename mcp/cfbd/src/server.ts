/**
 * College Football Data MCP Server
 *
 * HTTP entry point: validates the environment, opens the token store and
 * the response cache, and serves the app until SIGTERM/SIGINT.
 */

import { Server } from 'node:http';
import { logger, errorMessage } from './lib/logger.js';
import { validateEnv, getEnv } from './lib/env.js';
import { AuthorizationCodeStore } from './auth/code-store.js';
import { TokenStore } from './auth/token-store.js';
import { createCacheProvider } from './services/cache/index.js';
import { createCfbdClient } from './services/cfbd/index.js';
import { createApp, type CfbdMcpApp } from './app.js';

// --- Environment validation (fail fast) ---

try {
  validateEnv();
} catch (error) {
  logger.error('Failed to start server: environment validation failed', {
    error: errorMessage(error),
  });
  process.exit(1);
}

const env = getEnv();

// --- Infrastructure ---

const tokenStore = new TokenStore(env.TOKEN_DB_PATH);
const codeStore = new AuthorizationCodeStore({ ttlSeconds: env.AUTH_CODE_TTL_SECONDS });

const cacheProvider = createCacheProvider({
  redisUrl: env.REDIS_URL,
  timeoutMs: env.CACHE_TIMEOUT_MS,
  retryIntervalMs: env.CACHE_RETRY_INTERVAL_MS,
  defaultTtlSeconds: env.CACHE_DEFAULT_TTL_SECONDS,
});

const cfbdClient = createCfbdClient(env, cacheProvider);

const mcpApp = createApp({
  tokenStore,
  codeStore,
  cfbdClient,
  sharedSecret: env.MCP_SHARED_SECRET,
  publicBaseUrl: env.PUBLIC_BASE_URL,
});

// --- Graceful shutdown ---

function setupGracefulShutdown(httpServer: Server, app: CfbdMcpApp): void {
  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down CFBD MCP server...');

    httpServer.close();
    await app.close();
    await cacheProvider.close();
    tokenStore.close();

    logger.info('Shutdown complete');
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('Received shutdown signal', { signal });
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

// --- Start server ---

const httpServer = mcpApp.app.listen(env.PORT, () => {
  logger.info('CFBD MCP server started', {
    port: env.PORT,
    env: env.NODE_ENV,
    tokens: tokenStore.size,
    tokenPersistence: tokenStore.persistent,
    cache: env.REDIS_URL ? 'redis' : 'memory',
  });
});

setupGracefulShutdown(httpServer, mcpApp);
