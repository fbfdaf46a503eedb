export * from './types';
export * from './postgres';
