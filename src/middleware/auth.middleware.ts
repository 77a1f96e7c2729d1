import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AUTH_COOKIE_NAME, AuthService, JwtPayload } from '../services/auth/auth.service';

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: JwtPayload;
    }
  }
}

function readToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim();
  }

  const cookie: unknown = req.cookies?.[AUTH_COOKIE_NAME];
  return typeof cookie === 'string' ? cookie : undefined;
}

/**
 * JWT auth middleware.
 * Reads the bearer header or the session cookie, verifies the JWT, sets req.user.
 * Returns 401 if missing or invalid.
 */
export function createAuthMiddleware(authService: AuthService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = readToken(req);

    if (!token) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    try {
      req.user = authService.verifyToken(token);
      next();
    } catch {
      res.status(401).json({ error: 'Invalid or expired token' });
    }
  };
}
