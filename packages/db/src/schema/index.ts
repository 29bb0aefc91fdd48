export * from './core';
export * from './events';
export * from './finance';
export * from './direct-debit';
