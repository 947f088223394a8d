import { Module } from '@nestjs/common';
import { PaymentsController } from './payments.controller';
import { TransactionsController } from './transactions.controller';
import { PaymentsService } from './payments.service';

@Module({
  controllers: [PaymentsController, TransactionsController],
  providers: [PaymentsService],
  exports: [PaymentsService],
})
export class PaymentsModule {}
