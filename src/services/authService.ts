import { AuthError } from '../errors/AuthError.js';
import type { UserStore, UserSummary } from '../store/types.js';
import type { PasswordVerifier } from './passwordVerifier.js';

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly passwordVerifier: PasswordVerifier,
  ) {}

  // Unknown user and wrong password fail the same way
  async login(username: string, password: string): Promise<UserSummary> {
    const user = await this.users.findByLogin(username);
    if (!user) {
      throw new AuthError();
    }

    const isPasswordValid = await this.passwordVerifier.verify(password, user.password);
    if (!isPasswordValid) {
      throw new AuthError();
    }

    const { password: _, ...summary } = user;
    return summary;
  }
}
