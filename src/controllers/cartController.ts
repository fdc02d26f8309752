import { Request, Response, NextFunction } from 'express';
import type { CartStore } from '../store/types.js';

export class CartController {
  constructor(private readonly cart: CartStore) {}

  // Get a user's cart; an unknown user simply has an empty one
  getCart = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await this.cart.listForUser(req.params.userId);

      res.json(items);
    } catch (error) {
      next(error);
    }
  };

  // Add item to cart, merging into the existing (user, product) line
  addToCart = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id, product_id, quantity } = req.body;
      const { item, created } = await this.cart.addItem({
        userId: String(user_id),
        productId: String(product_id),
        quantity: Number(quantity),
      });

      if (created) {
        return res.status(201).json({
          success: true,
          message: 'Item added to cart successfully',
          data: item,
        });
      }

      res.json({
        success: true,
        message: 'Cart updated successfully',
        data: item,
      });
    } catch (error) {
      next(error);
    }
  };
}
