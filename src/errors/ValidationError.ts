import { AppError } from './AppError.js';

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', errors: FieldError[] = []) {
    super(message, 400, 'VALIDATION_ERROR', errors);
    this.name = 'ValidationError';
  }

  get errors(): FieldError[] {
    return Array.isArray(this.details) ? this.details : [];
  }
}
