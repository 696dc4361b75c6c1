export const version = '0.1.0';

export * from './constants/contract-status';
export * from './types/contract';
export * from './utils/contract-validation';
