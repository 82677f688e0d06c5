export * from './types';
export * from './errors';
export * from './resp';
export * from './connection';
export * from './client';
