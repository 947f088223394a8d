import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { FastifyRequest } from 'fastify';
import { CurrentUser } from '../interfaces/response.interface';
import { CredentialsService } from '../../modules/auth/credentials.service';

export const IS_PUBLIC_KEY = 'isPublic';

export type AuthenticatedRequest = FastifyRequest & { user?: CurrentUser };

/**
 * 认证守卫
 * 校验 Authorization: Bearer <Supabase access token>
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private reflector: Reflector,
    private credentialsService: CredentialsService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    // 检查是否为公开路由
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const authHeader = request.headers['authorization'];

    if (!authHeader?.startsWith('Bearer ')) {
      throw new UnauthorizedException({
        code: 'UNAUTHORIZED',
        message: 'Authentication required',
      });
    }

    const user = await this.credentialsService.verifyToken(authHeader.substring(7));
    if (!user) {
      throw new UnauthorizedException({
        code: 'UNAUTHORIZED',
        message: 'Invalid or expired token',
      });
    }

    // 设置用户信息到请求对象
    request.user = user;
    return true;
  }
}
