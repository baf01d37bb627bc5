import { Router } from 'express';
import {
  AuthController,
  createUserValidation,
  tokenValidation,
} from '../controllers/auth.controller';
import { AuthGuards } from '../middleware/auth.middleware';
import { RateLimiters } from '../middleware/rateLimit.middleware';

export const createAuthRouter = (
  controller: AuthController,
  guards: AuthGuards,
  limiters: RateLimiters
): Router => {
  const router = Router();

  // --- Public Endpoints ---

  // POST /create-user/ - Register with an email; returns the generated username and key once
  router.post('/create-user/', limiters.registration, createUserValidation, controller.createUser);

  // POST /token - Username/key for a bearer token (form or JSON body)
  router.post('/token', limiters.credentials, tokenValidation, controller.issueToken);

  // --- Protected Endpoints ---

  // GET /users/me/ - Caller's profile
  router.get('/users/me/', guards.authenticate, controller.me);

  // POST /users/me/rotate-key - Replace the caller's key
  router.post('/users/me/rotate-key', guards.authenticate, controller.rotateKey);

  return router;
};
