import type { Request, Response, NextFunction } from 'express';
import { jwtService, type JwtPayload } from '../services/jwt';
import { password } from '../utils/password';

export interface AuthenticatedRequest extends Request {
  user?: JwtPayload;
}

export function authenticateJWT() {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const header = req.headers['authorization'] || '';
      const token = header.startsWith('Bearer ') ? header.slice(7) : undefined;
      if (!token) return res.status(401).json({ success: false, message: 'Missing token' });
      req.user = jwtService.verifyAccess(token);
      next();
    } catch (err) {
      return res.status(401).json({ success: false, message: 'Invalid or expired token' });
    }
  };
}

export function requireStaff() {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    if (req.user?.role !== 'staff') return res.status(403).json({ success: false, message: 'Staff access required' });
    next();
  };
}

// Every write to the shared order book needs the update password on top of a staff login.
export function requireUpdatePassword() {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const fromHeader = req.headers['x-update-password'];
      const fromBody: unknown = req.body?.updatePassword;
      const candidate = typeof fromHeader === 'string' ? fromHeader : typeof fromBody === 'string' ? fromBody : '';
      if (!candidate) return res.status(403).json({ success: false, message: 'Update password required' });
      const ok = await password.matchesUpdatePassword(candidate);
      if (!ok) {
        console.warn('[Auth] Rejected write with incorrect update password', { user: req.user?.username, path: req.path });
        return res.status(403).json({ success: false, message: 'Incorrect update password' });
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
