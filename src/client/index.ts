export * from './RespCall';
export * from './RespClient';
export * from './connect';
