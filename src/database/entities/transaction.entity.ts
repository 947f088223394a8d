/**
 * 文档套餐类型
 */
export enum PackageType {
  SMALL = 'small',
  MEDIUM = 'medium',
  LARGE = 'large',
}

/**
 * 交易状态
 * pending -> succeeded | failed，终态不可再变
 */
export enum TransactionStatus {
  PENDING = 'pending',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}

/**
 * 交易记录实体（对应 transactions 表）
 */
export interface Transaction {
  id: string; // uuid
  account_id: string;
  stripe_payment_intent_id: string; // unique
  stripe_charge_id: string | null;
  package_type: PackageType;
  documents_count: number; // 创建时按价格表写入
  amount: number; // 最小货币单位
  currency: string;
  status: TransactionStatus;
  created_at: string;
  completed_at: string | null;
}

/**
 * 新建交易参数
 */
export type NewTransaction = Pick<
  Transaction,
  | 'account_id'
  | 'stripe_payment_intent_id'
  | 'package_type'
  | 'documents_count'
  | 'amount'
  | 'currency'
>;
