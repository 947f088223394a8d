import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { PackageType, TransactionStatus } from '../../../database/entities';

export class CreateIntentDto {
  @IsEnum(PackageType)
  package_type!: PackageType;
}

export interface CreateIntentResponseDto {
  payment_intent_id: string;
  client_secret: string;
  amount: number;
  currency: string;
  documents_count: number;
}

export class ConfirmPaymentDto {
  @IsString()
  @IsNotEmpty()
  payment_intent_id!: string;
}

export type ConfirmPaymentResponseDto =
  | {
      status: 'succeeded';
      documents_added: number;
      new_balance: number;
    }
  | {
      // Stripe 仍在处理，客户端稍后重试
      status: 'processing';
      documents_added: 0;
      new_balance: number;
    };

export class GetTransactionsQueryDto {
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number = 20;

  @IsString()
  @IsOptional()
  cursor?: string;
}

export interface TransactionResponseDto {
  id: string;
  payment_intent_id: string;
  package_type: string;
  documents_count: number;
  amount: number;
  currency: string;
  status: TransactionStatus;
  created_at: string;
  completed_at: string | null;
}
