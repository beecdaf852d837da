import express, { Express } from 'express';
import { Server } from 'http';
import { GatewaySettings, config } from '../shared/config';
import { Logger, logger as rootLogger } from '../shared/logger';
import { AdmissionPipeline, createAdmissionPipeline } from './middleware/admission';
import { createCorsMiddleware } from './middleware/cors';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRequestLogger } from './middleware/requestLogger';
import { RateLimiter } from './policy/rateLimiter';
import { createAuthRoutes } from './routes/auth';
import { createIdentityRoutes } from './routes/identity';
import { AuthService } from './services/authService';
import { ApiKeyStore } from './store/apiKeyStore';
import { KeyValueStore, RedisKeyValueStore } from './store/keyValueStore';
import { RefreshTokenStore } from './store/refreshTokenStore';
import { RevocationList } from './store/revocationList';
import { UserStore } from './store/userStore';
import { ClaimsCodec } from './tokens/claimsCodec';
import { TokenIssuer } from './tokens/tokenIssuer';
import { TokenValidator } from './tokens/tokenValidator';

export interface GatewayOptions {
  store: KeyValueStore;
  /** Overrides applied on top of the environment configuration. */
  settings?: Partial<GatewaySettings>;
  logger?: Logger;
}

export interface Gateway {
  app: Express;
  settings: GatewaySettings;
  store: KeyValueStore;
  codec: ClaimsCodec;
  issuer: TokenIssuer;
  validator: TokenValidator;
  revocations: RevocationList;
  refreshTokens: RefreshTokenStore;
  apiKeys: ApiKeyStore;
  users: UserStore;
  rateLimiter: RateLimiter;
  authService: AuthService;
  admission: AdmissionPipeline;
}

export function createGateway(options: GatewayOptions): Gateway {
  const settings: GatewaySettings = { ...config.gateway, ...options.settings };
  const logger = options.logger ?? rootLogger;
  const { store } = options;

  const codec = new ClaimsCodec(settings.jwtSecret);
  const revocations = new RevocationList(store, settings.clockToleranceSeconds);
  const refreshTokens = new RefreshTokenStore(store);
  const apiKeys = new ApiKeyStore(store);
  const users = new UserStore(store);
  const rateLimiter = new RateLimiter(store);
  const issuer = new TokenIssuer(codec, refreshTokens);
  const validator = new TokenValidator(codec, revocations, settings.clockToleranceSeconds);
  const authService = new AuthService(users, issuer, refreshTokens, revocations, settings, logger);
  const admission = createAdmissionPipeline({ validator, apiKeys, rateLimiter, logger, settings });

  if (settings.storeFailurePolicy === 'open') {
    logger.warn('Store failure policy is OPEN: revocation and rate-limit checks are skipped during store outages');
  }

  const app = express();
  app.use(createRequestLogger(logger));
  app.use(express.json());
  app.use(createCorsMiddleware({ allowedOrigins: settings.corsAllowedOrigins, apiKeyHeader: settings.apiKeyHeader }));

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'api-gateway' });
  });

  app.use('/auth', createAuthRoutes(authService, admission));
  app.use('/api/v1', createIdentityRoutes(admission));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return {
    app,
    settings,
    store,
    codec,
    issuer,
    validator,
    revocations,
    refreshTokens,
    apiKeys,
    users,
    rateLimiter,
    authService,
    admission,
  };
}

// Initialize and start
export async function start(): Promise<Server> {
  const store = new RedisKeyValueStore(config.gateway.redisUrl, { commandTimeoutMs: config.gateway.storeTimeoutMs });
  await store.connect();

  const { app, settings } = createGateway({ store });
  const server = app.listen(settings.port, () => {
    rootLogger.info({ port: settings.port, failurePolicy: settings.storeFailurePolicy }, 'Gateway listening');
  });

  const shutdown = (signal: string): void => {
    rootLogger.info({ signal }, 'Shutting down');
    server.close((closeError) => {
      if (closeError) {
        rootLogger.error({ err: closeError }, 'Error while closing HTTP server');
      }
      void store
        .disconnect()
        .catch((error: unknown) => rootLogger.error({ err: error }, 'Error while closing store connection'))
        .finally(() => process.exit(closeError ? 1 : 0));
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}

if (require.main === module) {
  start().catch((error: unknown) => {
    rootLogger.fatal({ err: error }, 'Gateway failed to start');
    process.exit(1);
  });
}
