import { Global, Module } from '@nestjs/common';
import { BILLING_CONFIG, billingConfigProvider } from './billing.config';

@Global()
@Module({
  providers: [billingConfigProvider],
  exports: [BILLING_CONFIG],
})
export class BillingConfigModule {}
