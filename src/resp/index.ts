export * from './types';
export * from './RespEncoder';
export * from './RespDecoder';
export {MAX_BULK_LENGTH} from './constants';
