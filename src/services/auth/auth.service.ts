import jwt from 'jsonwebtoken';

export interface JwtPayload {
  userId: string;
  email: string;
}

const JWT_EXPIRY = '7d';
export const AUTH_COOKIE_NAME = 'assistme_token';

/**
 * Owner identity carried as a JWT. Issuing tokens (login) lives in the
 * account service; this side only signs for tooling/tests and verifies.
 */
export class AuthService {
  constructor(private readonly jwtSecret: string) {}

  signToken(userId: string, email: string): string {
    return jwt.sign({ userId, email }, this.jwtSecret, { expiresIn: JWT_EXPIRY });
  }

  verifyToken(token: string): JwtPayload {
    const decoded = jwt.verify(token, this.jwtSecret);
    if (
      typeof decoded !== 'object' ||
      typeof decoded.userId !== 'string' ||
      typeof decoded.email !== 'string'
    ) {
      throw new jwt.JsonWebTokenError('token payload is missing the user');
    }
    return { userId: decoded.userId, email: decoded.email };
  }
}
