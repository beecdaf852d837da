import { Request, RequestHandler, Response } from 'express';
import { GatewaySettings } from '../../shared/config';
import { GatewayError, StoreUnavailableError, sendError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import {
  AuthContext,
  CredentialScheme,
  Identity,
  PresentedCredential,
  RateLimitDecision,
  RateLimitRule,
} from '../../shared/types';
import { requireAnyRole, requireTenant } from '../policy/authorizationGate';
import { RateLimiter } from '../policy/rateLimiter';
import { ApiKeyStore } from '../store/apiKeyStore';
import { TokenValidator } from '../tokens/tokenValidator';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

// Stages a request has passed; the final Admitted state is the `admitted` outcome of an Admission
export type AdmissionState =
  | 'Unauthenticated'
  | 'CredentialResolved'
  | 'RevocationChecked'
  | 'AuthorizationChecked'
  | 'RateLimited';

export interface GuardOptions {
  /** Admit only identities holding at least one of these roles. */
  roles?: readonly string[];
  requireTenant?: boolean;
  schemes?: readonly CredentialScheme[];
  /** Route-specific rule; `false` opts the route out of rate limiting. */
  rateLimit?: RateLimitRule | false;
}

/** A rejection carries the last state the request reached before failing. */
export type Admission =
  | { outcome: 'admitted'; context: AuthContext; rateLimit: RateLimitDecision | null }
  | { outcome: 'rejected'; state: AdmissionState; error: GatewayError; rateLimit: RateLimitDecision | null };

export type AdmissionSettings = Pick<
  GatewaySettings,
  'apiKeyHeader' | 'storeFailurePolicy' | 'rateLimitMax' | 'rateLimitWindowSeconds' | 'rateLimitKey'
>;

export interface AdmissionDependencies {
  validator: TokenValidator;
  apiKeys: ApiKeyStore;
  rateLimiter: RateLimiter;
  logger: Logger;
  settings: AdmissionSettings;
}

export interface AdmissionPipeline {
  admit(req: Request, options?: GuardOptions): Promise<Admission>;
  guard(options?: GuardOptions): RequestHandler;
}

const ALL_SCHEMES: readonly CredentialScheme[] = ['bearer', 'apiKey'];

export function extractCredential(
  req: Request,
  apiKeyHeader: string,
  schemes: readonly CredentialScheme[] = ALL_SCHEMES,
): PresentedCredential {
  const authHeader = req.headers.authorization;
  const apiKey = schemes.includes('apiKey') ? req.get(apiKeyHeader) : undefined;

  if (authHeader && schemes.includes('bearer')) {
    if (authHeader.startsWith('Bearer ')) {
      const token = authHeader.slice(7).trim();
      if (!token) {
        throw new GatewayError('MISSING_CREDENTIAL', 'Missing token');
      }
      return { scheme: 'bearer', token };
    }
    // Another Authorization scheme only counts as malformed when no API key backs the request
    if (!apiKey) {
      throw new GatewayError('MALFORMED_TOKEN', 'Malformed authorization header');
    }
  }

  if (apiKey) {
    return { scheme: 'apiKey', key: apiKey };
  }

  throw new GatewayError('MISSING_CREDENTIAL', 'Authentication required');
}

export function setRateLimitHeaders(res: Response, decision: RateLimitDecision): void {
  res.setHeader('X-RateLimit-Limit', String(decision.limit));
  res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
  res.setHeader('X-RateLimit-Reset', String(decision.resetAt));
}

export function createAdmissionPipeline(deps: AdmissionDependencies): AdmissionPipeline {
  const { validator, apiKeys, rateLimiter, logger, settings } = deps;

  // Runs a store-backed check under the configured failure policy. Under
  // 'open' an outage skips the check and yields null.
  async function underFailurePolicy<T>(check: string, req: Request, run: () => Promise<T>): Promise<T | null> {
    try {
      return await run();
    } catch (error) {
      if (!(error instanceof StoreUnavailableError) || settings.storeFailurePolicy === 'closed') {
        throw error;
      }
      logger.error(
        { err: error.cause, operation: error.operation, check, method: req.method, path: req.path },
        'Store unavailable, admitting request without check (fail-open)',
      );
      return null;
    }
  }

  async function resolve(credential: PresentedCredential): Promise<AuthContext> {
    if (credential.scheme === 'bearer') {
      const { identity, claims } = await validator.verify(credential.token);
      return { identity, credential: { scheme: 'bearer', token: credential.token, expiresAt: claims.exp } };
    }
    // No identity without the store: API keys never fail open
    const identity = await apiKeys.resolve(credential.key);
    return { identity, credential: { scheme: 'apiKey' } };
  }

  function authorize(identity: Identity, options: GuardOptions): void {
    if (options.roles && options.roles.length > 0 && !requireAnyRole(identity, options.roles)) {
      throw new GatewayError('FORBIDDEN', 'Insufficient role permissions');
    }
    if (options.requireTenant && !requireTenant(identity)) {
      throw new GatewayError('FORBIDDEN', 'Tenant access required');
    }
  }

  function discriminatorFor(req: Request, identity: Identity): string {
    if (settings.rateLimitKey === 'ip') {
      return `ip:${req.ip ?? 'unknown'}`;
    }
    return `user:${identity.userId}`;
  }

  async function admit(req: Request, options: GuardOptions = {}): Promise<Admission> {
    let state: AdmissionState = 'Unauthenticated';
    let rateLimit: RateLimitDecision | null = null;

    try {
      const credential = extractCredential(req, settings.apiKeyHeader, options.schemes);

      const context = await resolve(credential);
      state = 'CredentialResolved';

      if (credential.scheme === 'bearer') {
        const { token } = credential;
        const revoked = await underFailurePolicy('revocation', req, () => validator.isRevoked(token));
        if (revoked) {
          throw new GatewayError('REVOKED', 'Token has been revoked');
        }
      }
      state = 'RevocationChecked';

      authorize(context.identity, options);
      state = 'AuthorizationChecked';

      const rule: RateLimitRule | null =
        options.rateLimit === false
          ? null
          : options.rateLimit ?? { limit: settings.rateLimitMax, windowSeconds: settings.rateLimitWindowSeconds };
      if (rule) {
        const discriminator = discriminatorFor(req, context.identity);
        rateLimit = await underFailurePolicy('rateLimit', req, () =>
          rateLimiter.allow(discriminator, rule.limit, rule.windowSeconds),
        );
        if (rateLimit && !rateLimit.allowed) {
          throw new GatewayError('RATE_LIMITED', 'Rate limit exceeded');
        }
      }
      state = 'RateLimited';

      return { outcome: 'admitted', context, rateLimit };
    } catch (error) {
      if (error instanceof GatewayError) {
        return { outcome: 'rejected', state, error, rateLimit };
      }
      throw error;
    }
  }

  function guard(options: GuardOptions = {}): RequestHandler {
    return async (req, res, next): Promise<void> => {
      let admission: Admission;
      try {
        admission = await admit(req, options);
      } catch (error) {
        next(error);
        return;
      }

      if (admission.rateLimit) {
        setRateLimitHeaders(res, admission.rateLimit);
      }

      if (admission.outcome === 'rejected') {
        const { error, state } = admission;
        if (error instanceof StoreUnavailableError) {
          logger.error(
            { err: error.cause, operation: error.operation, state, method: req.method, path: req.path },
            'Store unavailable, rejecting request (fail-closed)',
          );
        } else {
          logger.warn({ code: error.code, state, method: req.method, path: req.path }, 'Request rejected');
        }
        sendError(res, error);
        return;
      }

      req.authContext = admission.context;
      next();
    };
  }

  return { admit, guard };
}
