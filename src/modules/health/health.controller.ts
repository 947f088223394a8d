import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Public } from '../../common/decorators/public.decorator';
import { StripeService } from '../../providers/stripe/stripe.service';

@Controller()
export class HealthController {
  constructor(
    private readonly stripeService: StripeService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * GET /api
   */
  @Get()
  @Public()
  root() {
    return { status: 'online', version: '1.0.0' };
  }

  /**
   * GET /api/health
   */
  @Get('health')
  @Public()
  health() {
    return {
      status: 'healthy',
      database: this.configService.get<string>('database.driver'),
      stripe: this.stripeService.isConfigured() ? 'configured' : 'not configured',
    };
  }
}
