export * from './common';
export * from './profile';
export * from './screening';
export * from './ledger';
export * from './pipeline';
