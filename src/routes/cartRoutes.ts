import { Router } from 'express';
import { CartController } from '../controllers/cartController.js';
import { validateAddToCart, validateUserIdParam } from '../middleware/validation.js';

export const createCartRoutes = (controller: CartController) => {
  const router = Router();

  router.post('/', validateAddToCart, controller.addToCart);
  router.get('/:userId', validateUserIdParam, controller.getCart);

  return router;
};
