import { Router, RequestHandler } from 'express';
import { AuthController } from '../controllers/authController.js';
import { validateLogin } from '../middleware/validation.js';

export const createAuthRoutes = (controller: AuthController, authLimiter: RequestHandler) => {
  const router = Router();

  router.post('/login', authLimiter, validateLogin, controller.login);

  return router;
};
