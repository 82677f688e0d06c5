import {TransportError} from '../errors';

/**
 * Rejects with `TransportError('TIMEOUT')` if `promise` does not settle
 * within `timeout` milliseconds; `onTimeout` is called right after.
 */
export const withTimeout = <T>(timeout: number, promise: Promise<T>, onTimeout?: (error: TransportError) => void): Promise<T> => {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new TransportError('TIMEOUT');
      reject(error);
      if (onTimeout) onTimeout(error);
    }, timeout);
    promise.then((value) => {
      clearTimeout(timer);
      resolve(value);
    }, (error) => {
      clearTimeout(timer);
      reject(error);
    });
  });
};
