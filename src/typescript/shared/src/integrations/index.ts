export * from './factory';
export * from './strava';
