import {
  BadRequestException,
  Controller,
  Post,
  Headers,
  RawBodyRequest,
  Req,
  HttpCode,
} from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { StripeWebhookService } from './stripe-webhook.service';
import { Public } from '../../common/decorators/public.decorator';
import { ErrorCode } from '../../common/interfaces/response.interface';

@Controller('webhooks')
export class WebhooksController {
  constructor(private readonly stripeWebhookService: StripeWebhookService) {}

  /**
   * POST /api/webhooks/stripe
   * Stripe 回调
   */
  @Post('stripe')
  @Public()
  @HttpCode(200)
  async handleStripeWebhook(
    @Req() req: RawBodyRequest<FastifyRequest>,
    @Headers('stripe-signature') signature: string | undefined,
  ): Promise<{ received: boolean }> {
    const rawBody = req.rawBody;
    if (!rawBody || !signature) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'Missing payload or signature',
      });
    }
    await this.stripeWebhookService.handleWebhook(rawBody, signature);
    return { received: true };
  }
}
