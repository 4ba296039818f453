import { v4 as uuidv4 } from 'uuid';
import { PersistenceLayer } from '../repositories/PersistenceLayer';
import {
  Action,
  AuthCredentials,
  BatchResult,
  Principal,
  SessionToken,
  User,
  UserCreate,
} from '../types';
import { AuthError, ConflictError, InvalidTokenError, MissingTokenError, UnauthorizedError } from '../types/errors';
import { runBatch } from '../utils/batch';
import { ROLE_PERMISSIONS } from '../utils/constants';
import { logger } from '../utils/logger';
import { hashPassword, verifyPassword } from '../utils/password';
import { JWTService } from './JWTService';

export type PublicUser = Omit<User, 'passwordHash'>;

export interface AuthSession {
  token: SessionToken;
  principal: Principal;
}

/**
 * Authenticates callers and answers "may this token do that?". The
 * scheduling core only ever talks to this interface.
 */
export interface IdentityProvider {
  authenticate(credentials: AuthCredentials): Promise<AuthSession>;
  authorize(token: SessionToken | undefined, action: Action): Promise<boolean>;
  identify(token: SessionToken | undefined): Promise<Principal>;
}

const toPublicUser = ({ passwordHash: _hash, ...user }: User): PublicUser => user;

/**
 * Calls `authorize` and turns a denial, or a provider failure, into
 * `UnauthorizedError` before the caller has touched anything.
 */
export async function requireAuthorization(
  identity: IdentityProvider,
  token: SessionToken | undefined,
  action: Action,
): Promise<Principal> {
  let allowed = false;
  try {
    allowed = await identity.authorize(token, action);
  } catch (error) {
    logger.error(`💥 Identity provider failed while authorizing ${action}:`, error);
  }

  if (!allowed) throw new UnauthorizedError(`Not authorized to ${action}`);
  return identity.identify(token);
}

/**
 * JWT session tokens over the user collection.
 */
export class AuthService implements IdentityProvider {
  constructor(
    private readonly persistence: PersistenceLayer,
    private readonly jwtService: JWTService,
  ) {}

  /**
   * 🔑 Exchange credentials for a session token
   */
  async authenticate(credentials: AuthCredentials): Promise<AuthSession> {
    const user = await this.persistence.repositories.users.findByEmail(credentials.email);
    if (!user || !(await verifyPassword(credentials.password, user.passwordHash))) {
      logger.warn(`🚫 Failed login attempt for ${credentials.email}`);
      throw new AuthError();
    }

    const principal: Principal = { userId: user.userId, email: user.email, role: user.role };
    logger.info(`🔓 User logged in: ${user.email}`);
    return { token: this.jwtService.sign(principal), principal };
  }

  async identify(token: SessionToken | undefined): Promise<Principal> {
    return this.jwtService.verify(token);
  }

  /**
   * False for an absent or invalid token and for roles lacking `action`.
   * Invalid tokens are logged; absent ones are routine.
   */
  async authorize(token: SessionToken | undefined, action: Action): Promise<boolean> {
    let principal: Principal;
    try {
      principal = this.jwtService.verify(token);
    } catch (error) {
      if (error instanceof MissingTokenError) return false;
      if (error instanceof InvalidTokenError) {
        logger.warn(`🔐 Rejected session token for ${action}: ${error.message}`);
        return false;
      }
      throw error;
    }

    const allowed = ROLE_PERMISSIONS[principal.role].has(action);
    if (!allowed) logger.warn(`Access denied: ${principal.email} (${principal.role}) → ${action}`);
    return allowed;
  }

  /**
   * 🧩 Register users (admin only). Each user succeeds or fails on its own.
   */
  async register(users: UserCreate[], token: SessionToken | undefined): Promise<BatchResult<PublicUser>[]> {
    await requireAuthorization(this, token, 'user:create');
    return runBatch('register-user', users, (user) => this.createUser(user));
  }

  /**
   * Creates the first admin when the user collection is empty.
   */
  async bootstrapAdmin(email: string, password: string): Promise<PublicUser | null> {
    if ((await this.persistence.repositories.users.count()) > 0) return null;

    const admin = await this.createUser({ email, password, name: 'Administrator', role: 'admin' });
    logger.info(`👑 Bootstrap admin created: ${admin.email}`);
    return admin;
  }

  private async createUser(data: UserCreate): Promise<PublicUser> {
    const passwordHash = await hashPassword(data.password);

    return this.persistence.transaction(async ({ users }) => {
      if (await users.findByEmail(data.email)) {
        throw new ConflictError(`User already exists with email ${data.email}`, 'USER_EXISTS');
      }

      const created = await users.insert({
        userId: uuidv4(),
        email: data.email.toLowerCase(),
        name: data.name,
        organisation: data.organisation,
        role: data.role,
        passwordHash,
        createdAt: new Date(),
      });

      logger.info(`✅ New user registered: ${created.email} (${created.role})`);
      return toPublicUser(created);
    });
  }
}
