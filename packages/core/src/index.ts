export * from './schemas/movie';
export * from './schemas/access-log';
export * from './contracts/command';
