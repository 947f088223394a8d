import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ConsumeSource } from '../../../database/repositories';

export class ProcessDocumentDto {
  @IsString()
  @MaxLength(255)
  @IsOptional()
  document_name?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  case_id?: string;
}

export interface ProcessDocumentResponseDto {
  success: true;
  remaining_balance: number;
  was_trial: boolean;
  source: ConsumeSource;
  message: string;
}
