export * from './accounts.repository';
export * from './transactions.repository';
export * from './usage-logs.repository';
