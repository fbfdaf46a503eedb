export * from './activity';
export * from './credential';
export * from './events';
export * from './sync-status';
