export * from './name';
export * from './version';
export * from './range';
