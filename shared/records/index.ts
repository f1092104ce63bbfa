export * from './schema';
export * from './envelope';
export * from './definitions';
