import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';
import { PaymentsService } from './payments.service';
import {
  ConfirmPaymentDto,
  ConfirmPaymentResponseDto,
  CreateIntentDto,
  CreateIntentResponseDto,
} from './dto/payment.dto';

@Controller('payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  /**
   * POST /api/payments/create-intent
   * 购买文档套餐
   */
  @Post('create-intent')
  async createIntent(
    @Body() dto: CreateIntentDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<CreateIntentResponseDto> {
    return this.paymentsService.createIntent(user.id, dto);
  }

  /**
   * POST /api/payments/confirm
   * 确认支付并增加余额
   */
  @Post('confirm')
  @HttpCode(200)
  async confirm(
    @Body() dto: ConfirmPaymentDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<ConfirmPaymentResponseDto> {
    return this.paymentsService.confirm(user.id, dto);
  }
}
