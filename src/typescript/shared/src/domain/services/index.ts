export * from './reconciler';
export * from './backfill';
