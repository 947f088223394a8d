import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { CurrentUser as ICurrentUser } from '../interfaces/response.interface';
import { AuthenticatedRequest } from '../guards/auth.guard';

/**
 * 获取当前用户装饰器
 * 只用于受 AuthGuard 保护的路由
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): ICurrentUser => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException({
        code: 'UNAUTHORIZED',
        message: 'Authentication required',
      });
    }
    return request.user;
  },
);
