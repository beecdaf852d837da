import { Router } from 'express';
import { z } from 'zod';
import { GatewayError } from '../../shared/errors';
import { UserRecord } from '../../shared/types';
import { AdmissionPipeline } from '../middleware/admission';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthResult, AuthService } from '../services/authService';

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
});

const registerSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  name: z.string().trim().min(1),
  roles: z.array(z.string().min(1)).optional(),
  tenant_id: z.string().optional(),
});

const refreshSchema = z.object({
  refresh_token: z.string().min(1),
});

const logoutSchema = z.object({
  refresh_token: z.string().min(1).optional(),
});

function toUserResponse(user: UserRecord) {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    roles: user.roles,
    tenant_id: user.tenantId,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}

function toAuthResponse(result: AuthResult) {
  return {
    access_token: result.accessToken,
    refresh_token: result.refreshToken,
    expires_at: new Date(result.expiresAt * 1000).toISOString(),
    user: toUserResponse(result.user),
  };
}

export function createAuthRoutes(authService: AuthService, admission: AdmissionPipeline): Router {
  const router = Router();

  // POST /auth/login
  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { email, password } = loginSchema.parse(req.body);
      const result = await authService.login({ email, password });
      res.json(toAuthResponse(result));
    }),
  );

  // POST /auth/register
  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const body = registerSchema.parse(req.body);
      const result = await authService.register({
        email: body.email,
        password: body.password,
        name: body.name,
        roles: body.roles,
        tenantId: body.tenant_id,
      });
      res.status(201).json(toAuthResponse(result));
    }),
  );

  // POST /auth/refresh - single-use rotation
  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const { refresh_token: refreshToken } = refreshSchema.parse(req.body);
      const result = await authService.refresh(refreshToken);
      res.json(toAuthResponse(result));
    }),
  );

  // POST /auth/logout - bearer only, an API key cannot be logged out
  router.post(
    '/logout',
    admission.guard({ schemes: ['bearer'] }),
    asyncHandler(async (req, res) => {
      const context = req.authContext;
      if (!context) {
        throw new GatewayError('MISSING_CREDENTIAL', 'Authentication required');
      }

      const { refresh_token: refreshToken } = logoutSchema.parse(req.body ?? {});
      await authService.logout(context, refreshToken);
      res.json({ message: 'Logged out successfully' });
    }),
  );

  return router;
}
