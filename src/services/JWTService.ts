import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';
import { Principal, UserRole } from '../types';
import { InvalidTokenError, MissingTokenError } from '../types/errors';

const ROLES: readonly UserRole[] = ['admin', 'operator', 'viewer'];

const isRole = (value: unknown): value is UserRole =>
  ROLES.some((role) => role === value);

export class JWTService {
  constructor(
    private readonly secret: string,
    private readonly expiresInSeconds: number = 24 * 60 * 60,
  ) {}

  /**
   * Issue a session token for a principal.
   */
  sign(principal: Principal): string {
    const options: SignOptions = { expiresIn: this.expiresInSeconds, subject: principal.userId };
    return jwt.sign({ email: principal.email, role: principal.role }, this.secret, options);
  }

  /**
   * Verify a session token. An absent token and a bad one fail differently
   * so callers can log them apart.
   */
  verify(token: string | undefined): Principal {
    if (!token) throw new MissingTokenError();

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) throw new InvalidTokenError('token expired');
      if (error instanceof jwt.JsonWebTokenError) throw new InvalidTokenError(error.message);
      throw error;
    }

    if (typeof decoded === 'string' || !decoded.sub || typeof decoded.email !== 'string' || !isRole(decoded.role)) {
      throw new InvalidTokenError('unexpected payload');
    }

    return { userId: decoded.sub, email: decoded.email, role: decoded.role };
  }
}
