import { Inject, Injectable, Logger } from '@nestjs/common';
import { AccountsRepository } from '../../database/repositories';
import { RecordConflictError } from '../../database/database.errors';
import { Account } from '../../database/entities';
import { BILLING_CONFIG, BillingConfig } from '../../common/config/billing.config';
import { EmailTakenException } from '../../common/exceptions/domain.exceptions';
import { CredentialsService } from './credentials.service';
import { LoginDto, RegisterDto, TokenResponseDto } from './dto/auth.dto';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private credentialsService: CredentialsService,
    private accountsRepository: AccountsRepository,
    @Inject(BILLING_CONFIG) private billingConfig: BillingConfig,
  ) {}

  /**
   * 注册：创建 Auth 用户和账户，开始体验期
   * email 唯一性由 accounts 表的唯一索引保证
   */
  async register(dto: RegisterDto): Promise<Account> {
    const userId = await this.credentialsService.createUser(dto.email, dto.password);

    const trialStartedAt = new Date();
    const trialEndsAt = new Date(
      trialStartedAt.getTime() + this.billingConfig.trialPeriodDays * DAY_MS,
    );

    try {
      const account = await this.accountsRepository.create({
        id: userId,
        email: dto.email,
        trial_started_at: trialStartedAt.toISOString(),
        trial_ends_at: trialEndsAt.toISOString(),
      });
      this.logger.log(`Account registered: ${account.id}, trial ends at ${account.trial_ends_at}`);
      return account;
    } catch (err) {
      // 账户写入失败，回滚 Auth 用户；回滚失败只记录，不覆盖原始错误
      await this.credentialsService.deleteUser(userId).catch((rollbackErr: unknown) => {
        this.logger.error(
          `Failed to roll back auth user ${userId}: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`,
        );
      });
      if (err instanceof RecordConflictError) {
        throw new EmailTakenException();
      }
      throw err;
    }
  }

  /**
   * 注册并直接登录
   */
  async registerAndSignIn(dto: RegisterDto): Promise<TokenResponseDto> {
    await this.register(dto);
    return this.login(dto);
  }

  async login(dto: LoginDto): Promise<TokenResponseDto> {
    const token = await this.credentialsService.signIn(dto.email, dto.password);
    return {
      access_token: token.access_token,
      token_type: 'bearer',
      expires_in: token.expires_in,
    };
  }
}
