import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../errors/NotFoundError.js';
import type { ProductStore } from '../store/types.js';

export class ProductController {
  constructor(private readonly products: ProductStore) {}

  // Get all products, optionally for one category. Lists go out as bare arrays.
  getProducts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { category } = req.query;
      const products = await this.products.list(typeof category === 'string' && category ? category : undefined);

      res.json(products);
    } catch (error) {
      next(error);
    }
  };

  getFeaturedProducts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const products = await this.products.listFeatured();

      res.json(products);
    } catch (error) {
      next(error);
    }
  };

  getProductById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await this.products.findById(req.params.productId);
      if (!product) {
        throw new NotFoundError('Product not found');
      }

      res.json({
        success: true,
        data: product,
      });
    } catch (error) {
      next(error);
    }
  };
}
