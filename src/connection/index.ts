export * from './types';
export * from './TcpConnection';
