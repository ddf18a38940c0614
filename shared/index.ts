export * from './types/task';
export * from './types/backend';
export * from './types/model';
export * from './types/inference';
