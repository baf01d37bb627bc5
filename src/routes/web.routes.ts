import { Router } from 'express';
import { AuthController, createUserValidation } from '../controllers/auth.controller';
import { FileController } from '../controllers/file.controller';
import { AuthGuards } from '../middleware/auth.middleware';
import { RateLimiters } from '../middleware/rateLimit.middleware';

/**
 * HTML pages. The session lives in the `access_token` cookie set by POST /login.
 */
export const createWebRouter = (
  auth: AuthController,
  files: FileController,
  guards: AuthGuards,
  limiters: RateLimiters
): Router => {
  const router = Router();

  router.get('/', (_req, res) => res.redirect(303, '/dashboard'));

  router.get('/login', auth.loginPage);
  router.post('/login', limiters.credentials, auth.loginForm);

  router.get('/register', auth.registerPage);
  router.post('/register', limiters.registration, createUserValidation, auth.registerForm);

  router.get('/logout', auth.logout);

  router.get('/dashboard', guards.authenticatePage, files.dashboard);

  return router;
};
