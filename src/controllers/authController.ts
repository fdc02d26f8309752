import { Request, Response, NextFunction } from 'express';
import { AuthService } from '../services/authService.js';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  // Dummy login: checks credentials, issues no token or session
  login = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = req.body;
      const user = await this.authService.login(String(username), String(password));

      res.json({
        success: true,
        message: 'Login successful',
        data: { user },
      });
    } catch (error) {
      next(error);
    }
  };
}
