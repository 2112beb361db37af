import { Router } from 'express';
import { UserModel } from '../models/user';
import { password } from '../utils/password';
import { jwtService } from '../services/jwt';
import { authenticateJWT, type AuthenticatedRequest } from '../middleware/auth';

export const authRouter = Router();

// POST /api/auth/login
// Body: { username, password }
authRouter.post('/login', async (req, res) => {
  try {
    const { username, password: pwd } = req.body || {};
    if (typeof username !== 'string' || typeof pwd !== 'string' || !username.trim() || !pwd) {
      return res.status(400).json({ success: false, message: 'username and password required' });
    }

    const user = await UserModel.findOne({ username: username.trim() }).lean();
    const ok = user ? await password.compare(pwd, user.passwordHash) : false;
    if (!user || !ok || user.isActive === false) {
      console.log('[LOGIN] ✗ Invalid credentials or user disabled:', username.trim());
      return res.status(401).json({ success: false, message: 'Invalid credentials' });
    }

    const payload = {
      userId: String(user._id),
      username: user.username,
      role: user.role,
      customerNames: user.role === 'customer' ? user.customerNames ?? [] : [],
    };
    const accessToken = jwtService.signAccess(payload);
    await UserModel.updateOne({ _id: user._id }, { $set: { lastLoginAt: new Date() } });
    console.log('[LOGIN] ✓ Signed in', { username: payload.username, role: payload.role });

    return res.json({
      success: true,
      data: {
        accessToken,
        user: payload,
      },
    });
  } catch (err) {
    console.error('[LOGIN] Unexpected error:', err);
    return res.status(500).json({ success: false, message: err instanceof Error ? err.message : 'Login failed' });
  }
});

// GET /api/auth/me
authRouter.get('/me', authenticateJWT(), (req: AuthenticatedRequest, res) => {
  return res.json({ success: true, data: req.user });
});
