// =============================================================================
// Auth Middleware — Resolves the tenant on every admin API request
// =============================================================================
// Admin endpoints take `Authorization: Bearer <JWT>` signed with JWT_SECRET.
// The token must carry a `tenantId` claim; every queue/circuit operation is
// scoped to that tenant.
// =============================================================================
import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import config from '../config';
import logger from './logger';

// Extend Express Request to include the resolved tenant
declare global {
  namespace Express {
    interface Request {
      tenantId?: string;
    }
  }
}

const tokenClaimsSchema = z.object({
  tenantId: z.string().min(1).max(128),
});

/** Issue an admin token for a tenant (used by ops tooling and tests). */
export function signTenantToken(tenantId: string, expiresIn: number = 2 * 60 * 60): string {
  return jwt.sign({ tenantId }, config.jwtSecret, { expiresIn });
}

export default function authMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const token = req.headers.authorization?.replace(/^Bearer\s+/i, '');

  if (!token) {
    res.status(401).json({ error: 'Missing authentication token' });
    return;
  }

  let decoded: unknown;
  try {
    decoded = jwt.verify(token, config.jwtSecret);
  } catch (err) {
    logger.debug('Rejected admin token', { reason: err instanceof Error ? err.name : 'unknown' });
    res.status(401).json({ error: 'Invalid authentication token' });
    return;
  }

  const claims = tokenClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    res.status(401).json({ error: 'Could not resolve tenantId' });
    return;
  }

  req.tenantId = claims.data.tenantId;
  next();
}
