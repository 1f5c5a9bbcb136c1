export * from './env';
export * from './database';
export * from './sentry';
export * from './optimization.config';
