import { CurrentUser } from '../../src/common/interfaces/response.interface';
import { AccessToken } from '../../src/modules/auth/credentials.service';
import {
  EmailTakenException,
  InvalidCredentialsException,
} from '../../src/common/exceptions/domain.exceptions';

interface StoredUser {
  id: string;
  email: string;
  password: string;
}

/**
 * 进程内 Supabase Auth 替身
 */
export class FakeCredentialsService {
  readonly users = new Map<string, StoredUser>(); // key: user id
  private sequence = 0;

  readonly createUser = jest.fn(async (email: string, password: string): Promise<string> => {
    // 与真实请求一样先让出事件循环，便于测试并发注册
    await Promise.resolve();
    for (const user of this.users.values()) {
      if (user.email === email) {
        throw new EmailTakenException();
      }
    }
    this.sequence += 1;
    const id = `00000000-0000-4000-8000-${String(this.sequence).padStart(12, '0')}`;
    this.users.set(id, { id, email, password });
    return id;
  });

  readonly deleteUser = jest.fn(async (userId: string): Promise<void> => {
    this.users.delete(userId);
  });

  readonly signIn = jest.fn(async (email: string, password: string): Promise<AccessToken> => {
    for (const user of this.users.values()) {
      if (user.email === email && user.password === password) {
        return { access_token: `token-${user.id}`, expires_in: 3600 };
      }
    }
    throw new InvalidCredentialsException();
  });

  readonly verifyToken = jest.fn(async (token: string): Promise<CurrentUser | null> => {
    const user = this.users.get(token.replace(/^token-/, ''));
    return user ? { id: user.id, email: user.email } : null;
  });
}
