import { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import type { AppConfig, NodeEnv } from '../config/index.js';
import { AppError } from '../errors/AppError.js';
import { StoreError } from '../errors/StoreError.js';
import { ValidationError } from '../errors/ValidationError.js';

export interface ErrorResponseBody {
  success: false;
  message: string;
  errors?: unknown;
  code?: string;
  stack?: string;
}

// body-parser marks unparseable JSON with this type
const isMalformedJson = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const createLimiters = (config: Pick<AppConfig, 'rateLimit'>) => ({
  // General rate limiter
  generalLimiter: rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.maxRequests,
    message: {
      success: false,
      message: 'Too many requests from this IP, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  }),

  // Strict rate limiter for the login endpoint
  authLimiter: rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.authMaxRequests,
    message: {
      success: false,
      message: 'Too many authentication attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  }),
});

export const buildErrorResponse = (err: unknown, nodeEnv: NodeEnv): { status: number; body: ErrorResponseBody } => {
  let status = 500;
  let message = 'Internal server error';
  let code = 'INTERNAL_ERROR';
  let errors: unknown;

  if (err instanceof StoreError) {
    // Store failures never leak driver details
    code = err.code;
  } else if (err instanceof AppError) {
    status = err.status;
    message = err.message;
    code = err.code;
    if (err instanceof ValidationError) {
      errors = err.errors;
    }
  } else if (isMalformedJson(err)) {
    status = 400;
    message = 'Malformed JSON body';
    code = 'MALFORMED_JSON';
  }

  const body: ErrorResponseBody = {
    success: false,
    message,
  };
  if (errors !== undefined) {
    body.errors = errors;
  }

  if (nodeEnv !== 'production') {
    body.code = code;
    if (status === 500 && err instanceof Error) {
      body.stack = err.stack;
    }
  }

  return { status, body };
};

// Error handling middleware
export const errorHandler = (nodeEnv: NodeEnv) => (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const { status, body } = buildErrorResponse(err, nodeEnv);

  // Log error with context
  console.error('Error occurred:', {
    status,
    message: err instanceof Error ? err.message : String(err),
    cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
    url: req.originalUrl,
    method: req.method,
  });

  res.status(status).json(body);
};

// Not found middleware
export const notFound = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    message: `Route ${req.originalUrl} not found`,
  });
};
