export * from './errors';
export * from './utils';
export * from './types';
export * from './validation';
export * from './constants';
