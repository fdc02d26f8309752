import { Router } from 'express';
import { ProductController } from '../controllers/productController.js';
import { validateProductQuery } from '../middleware/validation.js';

export const createProductRoutes = (controller: ProductController) => {
  const router = Router();

  router.get('/', validateProductQuery, controller.getProducts);
  router.get('/:productId', controller.getProductById);

  return router;
};
