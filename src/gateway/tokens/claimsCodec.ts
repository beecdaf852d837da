import * as jose from 'jose';
import { z } from 'zod';
import { GatewayError } from '../../shared/errors';

export const SIGNING_ALGORITHM = 'HS256';

const accessTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  roles: z.array(z.string()),
  tid: z.string(),
  jti: z.string().min(1),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
});

/** Claim set carried by an access token. Timestamps are unix seconds. */
export type AccessTokenClaims = z.infer<typeof accessTokenClaimsSchema>;

function malformed(message: string): GatewayError {
  return new GatewayError('MALFORMED_TOKEN', message);
}

/**
 * Signs and verifies access-token claim sets as compact JWS. Only HS256 is
 * accepted; a token declaring any other algorithm (including `none`) is
 * rejected before verification is attempted.
 */
export class ClaimsCodec {
  private readonly key: Uint8Array;

  constructor(secret: string) {
    this.key = new TextEncoder().encode(secret);
  }

  async encode(claims: AccessTokenClaims): Promise<string> {
    return new jose.SignJWT({
      email: claims.email,
      roles: claims.roles,
      tid: claims.tid,
    })
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: 'JWT' })
      .setSubject(claims.sub)
      .setJti(claims.jti)
      .setIssuedAt(claims.iat)
      .setNotBefore(claims.nbf)
      .setExpirationTime(claims.exp)
      .sign(this.key);
  }

  async decode(token: string): Promise<AccessTokenClaims> {
    if (token.split('.').length !== 3) {
      throw malformed('Invalid token format');
    }

    let header: jose.ProtectedHeaderParameters;
    try {
      header = jose.decodeProtectedHeader(token);
    } catch {
      throw malformed('Invalid token header');
    }

    if (header.alg !== SIGNING_ALGORITHM) {
      throw malformed('Unexpected algorithm');
    }

    // The signature is checked over the raw segments before the payload is
    // decoded, so any change to the payload surfaces as a bad signature.
    let payload: Uint8Array;
    try {
      ({ payload } = await jose.compactVerify(token, this.key, { algorithms: [SIGNING_ALGORITHM] }));
    } catch (error) {
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new GatewayError('BAD_SIGNATURE', 'Invalid signature');
      }
      throw malformed('Invalid token');
    }

    let data: unknown;
    try {
      data = JSON.parse(new TextDecoder().decode(payload));
    } catch {
      throw malformed('Invalid token payload');
    }

    const parsed = accessTokenClaimsSchema.safeParse(data);
    if (!parsed.success) {
      throw malformed('Missing required claims');
    }
    return parsed.data;
  }
}
