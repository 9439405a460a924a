export * from './types';
export * from './collaborators';
export * from './errors';
export * from './amounts';
export * from './validators';
export * from './admin';
