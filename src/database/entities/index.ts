export * from './account.entity';
export * from './transaction.entity';
export * from './usage-log.entity';
