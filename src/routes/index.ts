import { Router, RequestHandler } from 'express';
import type { AppConfig } from '../config/index.js';
import type { MobileStore } from '../store/types.js';
import type { PasswordVerifier } from '../services/passwordVerifier.js';
import { AuthService } from '../services/authService.js';
import { AuthController } from '../controllers/authController.js';
import { CartController } from '../controllers/cartController.js';
import { ProductController } from '../controllers/productController.js';
import { VersionController } from '../controllers/versionController.js';
import { healthCheck } from '../controllers/healthController.js';
import { createAuthRoutes } from './authRoutes.js';
import { createCartRoutes } from './cartRoutes.js';
import { createProductRoutes } from './productRoutes.js';

export interface MobileRouterDeps {
  config: Pick<AppConfig, 'appVersion' | 'minAppVersion'>;
  store: MobileStore;
  passwordVerifier: PasswordVerifier;
  authLimiter: RequestHandler;
}

// Everything under /api/mobile
export const createMobileRouter = ({ config, store, passwordVerifier, authLimiter }: MobileRouterDeps) => {
  const router = Router();
  const productController = new ProductController(store.products);

  router.get('/health', healthCheck);
  router.get('/version', new VersionController(config).getVersion);
  router.use('/auth', createAuthRoutes(new AuthController(new AuthService(store.users, passwordVerifier)), authLimiter));
  router.use('/products', createProductRoutes(productController));
  router.get('/featured', productController.getFeaturedProducts);
  router.use('/cart', createCartRoutes(new CartController(store.cart)));

  return router;
};
