import { Request, Response, NextFunction } from 'express';
import { body, param, query, validationResult } from 'express-validator';
import { ValidationError, type FieldError } from '../errors/ValidationError.js';

// Validation result handler
export const handleValidationErrors = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const result = validationResult(req);
  if (result.isEmpty()) {
    return next();
  }

  const errors: FieldError[] = result.array({ onlyFirstError: true }).map((error) => ({
    field: error.type === 'field' ? error.path : error.type,
    message: String(error.msg),
  }));
  next(new ValidationError('Validation failed', errors));
};

export const validateLogin = [
  body('username')
    .exists({ values: 'falsy' })
    .withMessage('Username (or email) is required')
    .bail()
    .isString()
    .withMessage('Username must be a string'),
  body('password')
    .exists({ values: 'falsy' })
    .withMessage('Password is required')
    .bail()
    .isString()
    .withMessage('Password must be a string'),
  handleValidationErrors,
];

// An empty ?category= means "no filter"; repeated or nested values are rejected.
export const validateProductQuery = [
  query('category')
    .optional({ values: 'falsy' })
    .not()
    .isArray()
    .withMessage('Category must be a single value')
    .bail()
    .isString()
    .withMessage('Category must be a string'),
  handleValidationErrors,
];

// Largest quantity a single add may carry
export const MAX_CART_QUANTITY = 10000;

export const validateAddToCart = [
  body('user_id')
    .exists({ values: 'falsy' })
    .withMessage('user_id is required')
    .bail()
    .isString()
    .withMessage('user_id must be a string')
    .bail()
    .trim()
    .notEmpty()
    .withMessage('user_id is required'),
  body('product_id')
    .exists({ values: 'falsy' })
    .withMessage('product_id is required')
    .bail()
    .isString()
    .withMessage('product_id must be a string')
    .bail()
    .trim()
    .notEmpty()
    .withMessage('product_id is required'),
  body('quantity')
    .exists({ values: 'null' })
    .withMessage('quantity is required')
    .bail()
    .not()
    .isArray()
    .withMessage('quantity must be a positive integer')
    .bail()
    .isInt({ min: 1 })
    .withMessage('quantity must be a positive integer')
    .bail()
    .isInt({ max: MAX_CART_QUANTITY })
    .withMessage(`quantity cannot exceed ${MAX_CART_QUANTITY}`)
    .toInt(),
  handleValidationErrors,
];

export const validateUserIdParam = [
  param('userId')
    .trim()
    .notEmpty()
    .withMessage('user_id is required'),
  handleValidationErrors,
];
