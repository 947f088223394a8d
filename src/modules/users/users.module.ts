import { Module } from '@nestjs/common';
import { QuotaModule } from '../quota/quota.module';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  imports: [QuotaModule],
  controllers: [UsersController],
  providers: [UsersService],
})
export class UsersModule {}
