export const name = '@index-meta/core';

export * from './config/loader';
export * from './repository';
