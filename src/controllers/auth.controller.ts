import { Request, Response } from 'express';
import type { AuthUser } from '../model/user.model';
import type AuthService from '../services/auth.service';
import type TokenService from '../services/token.service';
import asyncHandler from '../utils/asyncHandler';
import logger from '../utils/logger';

export const HOME_PATH = '/list';

interface IAuthResponse {
  success: boolean;
  accessToken?: string;
  message?: string;
  fields?: string[];
  user?: Pick<AuthUser, 'id' | 'username' | 'role' | 'permissions'>;
}

const publicUser = (user: AuthUser): IAuthResponse['user'] => ({
  id: user.id,
  username: user.username,
  role: user.role,
  permissions: user.permissions,
});

class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly tokenService: TokenService
  ) {}

  showRegisterForm = (_req: Request, res: Response<IAuthResponse>): void => {
    res.status(200).json({ success: true, fields: ['username', 'password1', 'password2'] });
  };

  register = asyncHandler(async (req: Request, res: Response<IAuthResponse>): Promise<void> => {
    const user = await this.authService.register(req.body);
    res.status(201).json({
      success: true,
      message: 'Account created successfully',
      user: publicUser(user),
    });
  });

  // Already signed-in users are sent on to the book list.
  showLoginForm = (req: Request, res: Response<IAuthResponse>): void => {
    if (req.user) {
      res.redirect(302, HOME_PATH);
      return;
    }
    res.status(200).json({ success: true, fields: ['username', 'password'] });
  };

  login = asyncHandler(async (req: Request, res: Response<IAuthResponse>): Promise<void> => {
    const { user, accessToken } = await this.authService.login(req.body);
    this.tokenService.setAccessTokenCookie(res, accessToken);

    res.status(200).json({
      success: true,
      accessToken,
      user: publicUser(user),
    });
  });

  logout = (req: Request, res: Response<IAuthResponse>): void => {
    if (req.user) {
      logger.info(`User logged out: ${req.user.username}`);
    }
    this.tokenService.clearAccessTokenCookie(res);
    res.status(200).json({ success: true, message: 'Logged out successfully' });
  };
}

export default AuthController;
