import { Request, Response } from 'express';
import { body, validationResult } from 'express-validator';
import { AppConfig } from '../config/env';
import { ACCESS_TOKEN_COOKIE, currentUser } from '../middleware/auth.middleware';
import { AuthService } from '../services/auth.service';
import { RegistrationDTO, TokenDTO, UserDTOMapper } from '../types/user-dtos';
import { describeError, isServiceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ResponseBuilder, sendServiceError } from '../utils/response-builder';
import { sendView } from '../utils/views';

const INVALID_LOGIN_MESSAGE = 'Incorrect username or password';

// Define input validation middleware (reusable)
export const createUserValidation = [
  body('email')
    .isString()
    .withMessage('Email must be valid.')
    .bail()
    .trim()
    .isEmail()
    .withMessage('Email must be valid.'),
];

export const tokenValidation = [
  body('username').notEmpty().withMessage('Username is required.'),
  body('password').notEmpty().withMessage('Password is required.'),
];

export interface AuthControllerDeps {
  authService: AuthService;
  config: Pick<AppConfig, 'nodeEnv'>;
}

/** Reads a form/JSON field that validation may not have covered. */
const field = (req: Request, name: string): string => {
  const value: unknown = req.body?.[name];
  return typeof value === 'string' ? value : '';
};

export const createAuthController = ({ authService, config }: AuthControllerDeps) => {
  /**
   * Handles account creation. POST /create-user/
   */
  const createUser = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    try {
      const { user, key } = await authService.register({ email: field(req, 'email') });
      const response: RegistrationDTO = { username: user.username, email: user.email, key };
      return ResponseBuilder.success(res, response, 201);
    } catch (error: unknown) {
      return sendServiceError(res, error, 'User registration');
    }
  };

  /**
   * Exchanges a username/key pair for a bearer token. POST /token
   */
  const issueToken = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    const username = field(req, 'username');
    try {
      const grant = await authService.login(username, field(req, 'password'));
      const response: TokenDTO = { access_token: grant.accessToken, token_type: grant.tokenType };
      return ResponseBuilder.success(res, response);
    } catch (error: unknown) {
      if (isServiceError(error, 'InvalidCredentials')) {
        logger.warn('Token request rejected', { username });
      }
      return sendServiceError(res, error, 'Token issue');
    }
  };

  /** GET /users/me/ */
  const me = (req: Request, res: Response): void => {
    ResponseBuilder.success(res, UserDTOMapper.toDTO(currentUser(req)));
  };

  /**
   * Replaces the caller's key. POST /users/me/rotate-key
   */
  const rotateKey = async (req: Request, res: Response): Promise<void> => {
    const user = currentUser(req);
    try {
      const key = await authService.rotateKey(user.id);
      return ResponseBuilder.success(res, { username: user.username, key });
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Key rotation');
    }
  };

  // --- HTML pages ---

  const loginPage = (_req: Request, res: Response): void => {
    sendView(res, 'login', { title: 'Log in' });
  };

  /**
   * Form login. Sets the session cookie and sends the browser to the dashboard.
   */
  const loginForm = async (req: Request, res: Response): Promise<void> => {
    const username = field(req, 'username');
    try {
      const grant = await authService.login(username, field(req, 'password'));
      res.cookie(ACCESS_TOKEN_COOKIE, grant.accessToken, {
        httpOnly: true,
        sameSite: 'lax',
        secure: config.nodeEnv === 'production',
        maxAge: grant.expiresIn * 1000,
      });
      return res.redirect(303, '/dashboard');
    } catch (error: unknown) {
      if (isServiceError(error, 'InvalidCredentials')) {
        logger.warn('Form login rejected', { username });
        return sendView(res, 'login', { title: 'Log in', error: INVALID_LOGIN_MESSAGE, username }, 401);
      }
      if (isServiceError(error, 'AccountInactive')) {
        return sendView(res, 'login', { title: 'Log in', error: 'Inactive user.', username }, 403);
      }
      logger.error('Form login failed', { username, error: describeError(error) });
      return sendView(res, 'login', { title: 'Log in', error: 'Login failed. Try again later.' }, 500);
    }
  };

  const registerPage = (_req: Request, res: Response): void => {
    sendView(res, 'register', { title: 'Register' });
  };

  const registerForm = async (req: Request, res: Response): Promise<void> => {
    if (!validationResult(req).isEmpty()) {
      return sendView(res, 'register', { title: 'Register', error: 'Email must be valid.' }, 422);
    }

    try {
      const { user, key } = await authService.register({ email: field(req, 'email') });
      return sendView(res, 'register', { title: 'Register', username: user.username, key }, 201);
    } catch (error: unknown) {
      if (isServiceError(error, 'EmailAlreadyExists')) {
        return sendView(
          res,
          'register',
          { title: 'Register', error: 'Email already registered.' },
          409
        );
      }
      logger.error('Form registration failed', { error: describeError(error) });
      return sendView(res, 'register', { title: 'Register', error: 'Registration failed.' }, 500);
    }
  };

  /** Clears the session cookie. Tokens already handed out stay valid until they expire. */
  const logout = (_req: Request, res: Response): void => {
    res.clearCookie(ACCESS_TOKEN_COOKIE, { httpOnly: true, sameSite: 'lax' });
    res.redirect(303, '/login');
  };

  return {
    createUser,
    issueToken,
    me,
    rotateKey,
    loginPage,
    loginForm,
    registerPage,
    registerForm,
    logout,
  };
};

export type AuthController = ReturnType<typeof createAuthController>;
