import { Controller, Get, Query } from '@nestjs/common';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import {
  CurrentUser as ICurrentUser,
  PaginatedResponse,
} from '../../common/interfaces/response.interface';
import { PaymentsService } from './payments.service';
import { GetTransactionsQueryDto, TransactionResponseDto } from './dto/payment.dto';

@Controller('transactions')
export class TransactionsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  /**
   * GET /api/transactions
   * 当前账户的交易记录
   */
  @Get()
  async getTransactions(
    @Query() query: GetTransactionsQueryDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PaginatedResponse<TransactionResponseDto>> {
    return this.paymentsService.listTransactions(user.id, query);
  }
}
