import { Request, Router } from 'express';
import { GatewayError } from '../../shared/errors';
import { AuthContext } from '../../shared/types';
import { AdmissionPipeline } from '../middleware/admission';

function authContextOf(req: Request): AuthContext {
  if (!req.authContext) {
    throw new GatewayError('MISSING_CREDENTIAL', 'Authentication required');
  }
  return req.authContext;
}

/** Example protected routes that only consume the admitted identity. */
export function createIdentityRoutes(admission: AdmissionPipeline): Router {
  const router = Router();

  router.get('/whoami', admission.guard(), (req, res) => {
    const { identity, credential } = authContextOf(req);
    res.json({
      user_id: identity.userId,
      email: identity.email,
      roles: identity.roles,
      tenant_id: identity.tenantId,
      scheme: credential.scheme,
    });
  });

  router.get('/tenant', admission.guard({ requireTenant: true }), (req, res) => {
    const { identity } = authContextOf(req);
    res.json({ tenant_id: identity.tenantId, user_id: identity.userId });
  });

  router.get('/admin/status', admission.guard({ roles: ['admin'] }), (req, res) => {
    const { identity } = authContextOf(req);
    res.json({ status: 'ok', admin: identity.userId });
  });

  return router;
}
