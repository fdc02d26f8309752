import { AppError } from './AppError.js';

/** Any failure talking to the document store. Reported to clients as a generic 500. */
export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'STORE_ERROR');
    this.name = 'StoreError';
    this.cause = cause;
  }
}
