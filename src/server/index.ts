export * from './Command';
export * from './RespCore';
export * from './RespRuntime';
export * from './RespServer';
export * from './RespTcpServer';
export * from './RespMemoryServer';
