import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { AuthError, isAuthApiError } from '@supabase/supabase-js';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { CurrentUser, ErrorCode } from '../../common/interfaces/response.interface';
import {
  EmailTakenException,
  InvalidCredentialsException,
  UpstreamUnavailableException,
} from '../../common/exceptions/domain.exceptions';

export interface AccessToken {
  access_token: string;
  expires_in: number;
}

const DUPLICATE_USER_CODES = new Set(['email_exists', 'user_already_exists']);

/**
 * 凭证服务：密码哈希与 token 签发由 Supabase Auth 负责
 */
@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);

  constructor(private supabaseService: SupabaseService) {}

  /**
   * 创建 Auth 用户，返回 user id
   */
  async createUser(email: string, password: string): Promise<string> {
    const { data, error } = await this.supabaseService.getClient().auth.admin.createUser({
      email,
      password,
      email_confirm: true,
    });

    if (error) {
      if (isAuthApiError(error) && error.code && DUPLICATE_USER_CODES.has(error.code)) {
        throw new EmailTakenException();
      }
      // weak_password、email_address_invalid 等属于输入问题
      if (isAuthApiError(error) && error.status < 500) {
        throw new BadRequestException({
          code: ErrorCode.INVALID_INPUT,
          message: error.message,
        });
      }
      throw this.toUpstreamError('createUser', error);
    }

    return data.user.id;
  }

  /**
   * 注册失败时回滚 Auth 用户
   */
  async deleteUser(userId: string): Promise<void> {
    const { error } = await this.supabaseService.getClient().auth.admin.deleteUser(userId);
    if (error) {
      this.logger.error(`Failed to delete auth user ${userId}: ${error.message}`);
      throw this.toUpstreamError('deleteUser', error);
    }
  }

  /**
   * 邮箱密码登录
   */
  async signIn(email: string, password: string): Promise<AccessToken> {
    const { data, error } = await this.supabaseService
      .createAnonClient()
      .auth.signInWithPassword({ email, password });

    if (error) {
      if (isAuthApiError(error) && error.status < 500) {
        throw new InvalidCredentialsException();
      }
      throw this.toUpstreamError('signIn', error);
    }

    return {
      access_token: data.session.access_token,
      expires_in: data.session.expires_in,
    };
  }

  /**
   * 校验 access token，无效或过期时返回 null
   */
  async verifyToken(token: string): Promise<CurrentUser | null> {
    const { data, error } = await this.supabaseService.getClient().auth.getUser(token);

    if (error) {
      if (isAuthApiError(error) && error.status < 500) {
        return null;
      }
      throw this.toUpstreamError('getUser', error);
    }

    return {
      id: data.user.id,
      email: data.user.email ?? null,
    };
  }

  private toUpstreamError(operation: string, error: AuthError): Error {
    if (isAuthApiError(error) && error.status < 500) {
      this.logger.error(`Supabase Auth ${operation} rejected: ${error.message}`);
      return error;
    }
    this.logger.warn(`Supabase Auth ${operation} unavailable: ${error.message}`);
    return new UpstreamUnavailableException('Authentication service');
  }
}
