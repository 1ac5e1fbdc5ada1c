import type { AuthUser } from '../model/user.model';
import type { UserRepository } from '../repositories/user.repository';
import { UnauthorizedError, ValidationError } from '../utils/customErrors';
import { loginSchema, registerSchema } from '../validators/auth.validators';
import { parseForm } from '../validators/formFields';
import type TokenService from './token.service';
import logger from '../utils/logger';

export const INVALID_LOGIN_MESSAGE =
  'Please enter a correct username and password. Note that both fields may be case-sensitive.';
export const DUPLICATE_USERNAME_MESSAGE = 'A user with that username already exists.';

export interface LoginResult {
  user: AuthUser;
  accessToken: string;
}

class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly tokenService: TokenService
  ) {}

  async register(raw: unknown): Promise<AuthUser> {
    const { username, password1 } = parseForm(registerSchema, raw);

    if (await this.users.existsByUsername(username)) {
      logger.warn(`Registration attempted with taken username: ${username}`);
      throw new ValidationError({ username: [DUPLICATE_USERNAME_MESSAGE] });
    }

    const user = await this.users.create({ username, password: password1 });
    logger.info(`New user registered: ${username}`);
    return user;
  }

  async login(raw: unknown): Promise<LoginResult> {
    const { username, password } = parseForm(loginSchema, raw);
    logger.info(`Login attempt for username: ${username}`);

    const user = await this.users.verifyCredentials(username, password);
    if (!user) {
      logger.warn(`Failed login for username: ${username}`);
      throw new UnauthorizedError(INVALID_LOGIN_MESSAGE);
    }

    if (!user.isActive) {
      logger.warn(`Inactive user attempted login: ${username}`);
      throw new UnauthorizedError('This account is inactive.');
    }

    await this.users.recordLogin(user.id);
    const accessToken = this.tokenService.generateAccessToken({
      userId: user.id,
      username: user.username,
    });

    logger.info(`Login successful for: ${username}`);
    return { user, accessToken };
  }
}

export default AuthService;
