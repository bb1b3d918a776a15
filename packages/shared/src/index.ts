export const name = '@index-meta/shared';

export * from './logger';
export * from './errors';
export * from './result';
export * from './fs';
export * from './config/schema';
