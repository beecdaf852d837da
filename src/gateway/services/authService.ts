import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { getNow, nowSeconds } from '../../shared/clock';
import { GatewayError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { AuthContext, Identity, UserRecord, normalizeRoles } from '../../shared/types';
import { RefreshTokenStore } from '../store/refreshTokenStore';
import { RevocationList } from '../store/revocationList';
import { UserStore, normalizeEmail } from '../store/userStore';
import { TokenIssuer } from '../tokens/tokenIssuer';

const DEFAULT_ROLES = ['user'];
const TIMING_PLACEHOLDER_PASSWORD = 'placeholder-password-for-unknown-users';

export interface AuthSettings {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  bcryptRounds: number;
  /** Roles a caller may request for itself at registration. */
  registrationRoles: readonly string[];
}

export interface RegisterInput {
  email: string;
  password: string;
  name: string;
  roles?: string[];
  tenantId?: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface AuthResult {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // access token expiry, unix seconds
  user: UserRecord;
}

export interface LogoutResult {
  refreshTokenRevoked: boolean;
}

function identityOf(user: UserRecord): Identity {
  return {
    userId: user.id,
    email: user.email,
    roles: normalizeRoles(user.roles),
    tenantId: user.tenantId,
  };
}

export class AuthService {
  private placeholderHash: Promise<string> | null = null;

  constructor(
    private readonly users: UserStore,
    private readonly issuer: TokenIssuer,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly revocations: RevocationList,
    private readonly settings: AuthSettings,
    private readonly logger: Logger,
  ) {}

  async register(input: RegisterInput): Promise<AuthResult> {
    const roles = normalizeRoles(input.roles && input.roles.length > 0 ? input.roles : DEFAULT_ROLES);

    // SECURITY: privileged roles are provisioned, never self-assigned
    const forbidden = roles.filter((role) => !this.settings.registrationRoles.includes(role));
    if (forbidden.length > 0) {
      throw new GatewayError('VALIDATION_FAILED', 'Requested roles cannot be self-assigned', { roles: forbidden });
    }

    const email = normalizeEmail(input.email);
    if (await this.users.findByEmail(email)) {
      throw new GatewayError('CONFLICT', 'A user with this email already exists');
    }

    const now = getNow().toISOString();
    const user: UserRecord = {
      id: uuidv4(),
      email,
      name: input.name,
      passwordHash: await bcrypt.hash(input.password, this.settings.bcryptRounds),
      roles,
      tenantId: input.tenantId ?? '',
      createdAt: now,
      updatedAt: now,
    };

    // Two concurrent registrations can both pass the lookup; only one create wins
    if (!(await this.users.create(user))) {
      throw new GatewayError('CONFLICT', 'A user with this email already exists');
    }

    this.logger.info({ userId: user.id, tenantId: user.tenantId }, 'User registered');
    return this.issueFor(user);
  }

  async login(input: LoginInput): Promise<AuthResult> {
    const user = await this.users.findByEmail(input.email);
    // Unknown emails still cost one bcrypt comparison so response time does not reveal which accounts exist
    const hash = user ? user.passwordHash : await this.hashForUnknownUser();
    const passwordValid = await bcrypt.compare(input.password, hash);

    if (!user || !passwordValid) {
      this.logger.warn({ email: normalizeEmail(input.email) }, 'Login failed');
      throw new GatewayError('INVALID_CREDENTIAL', 'Invalid email or password');
    }

    this.logger.info({ userId: user.id }, 'User logged in');
    return this.issueFor(user);
  }

  /**
   * Exchanges a refresh token for a new pair. The presented token is
   * consumed before anything else, so it can never succeed twice.
   */
  async refresh(refreshToken: string): Promise<AuthResult> {
    const record = await this.refreshTokens.consume(refreshToken);
    if (!record) {
      throw new GatewayError('INVALID_CREDENTIAL', 'Refresh token is invalid or already used');
    }
    if (record.revoked) {
      throw new GatewayError('REVOKED', 'Refresh token has been revoked');
    }
    if (nowSeconds() >= record.expiresAt) {
      throw new GatewayError('EXPIRED', 'Refresh token expired');
    }

    // Roles come from the user record, never from client input
    const user = await this.users.findById(record.userId);
    if (!user) {
      throw new GatewayError('INVALID_CREDENTIAL', 'Refresh token owner no longer exists');
    }

    this.logger.info({ userId: user.id }, 'Token pair rotated');
    return this.issueFor(user);
  }

  async logout(context: AuthContext, refreshToken?: string): Promise<LogoutResult> {
    const { credential, identity } = context;
    if (credential.scheme !== 'bearer') {
      throw new GatewayError('MISSING_CREDENTIAL', 'Logout requires a bearer token');
    }

    await this.revocations.revoke(credential.token, credential.expiresAt);

    const refreshTokenRevoked = refreshToken
      ? await this.refreshTokens.revoke(refreshToken, identity.userId)
      : false;

    this.logger.info({ userId: identity.userId, refreshTokenRevoked }, 'User logged out');
    return { refreshTokenRevoked };
  }

  private hashForUnknownUser(): Promise<string> {
    if (!this.placeholderHash) {
      this.placeholderHash = bcrypt.hash(TIMING_PLACEHOLDER_PASSWORD, this.settings.bcryptRounds);
    }
    return this.placeholderHash;
  }

  private async issueFor(user: UserRecord): Promise<AuthResult> {
    const { accessToken, refreshToken } = await this.issuer.issueTokenPair(
      identityOf(user),
      this.settings.accessTokenTtlSeconds,
      this.settings.refreshTokenTtlSeconds,
    );

    return {
      accessToken: accessToken.token,
      refreshToken: refreshToken.token,
      expiresAt: accessToken.expiresAt,
      user,
    };
  }
}
