import { Controller, Get } from '@nestjs/common';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';
import { AccountProfileDto, AccountStatusDto, UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * GET /api/users/me
   */
  @Get('me')
  async getProfile(@CurrentUser() user: ICurrentUser): Promise<AccountProfileDto> {
    return this.usersService.getProfile(user.id);
  }

  /**
   * GET /api/users/status
   * 能否处理文档、体验期与余额
   */
  @Get('status')
  async getStatus(@CurrentUser() user: ICurrentUser): Promise<AccountStatusDto> {
    return this.usersService.getStatus(user.id);
  }
}
