import { AppError } from './AppError.js';

export class AuthError extends AppError {
  constructor(message = 'Invalid username or password') {
    super(message, 401, 'AUTH_FAILED');
    this.name = 'AuthError';
  }
}
