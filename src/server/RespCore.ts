import {AvlMap} from 'sonic-forest/lib/avl/AvlMap';
import {cmpUint8Array} from '../util/buf';

/** Binary-safe string keyspace. */
export class RespCore {
  public readonly keys = new AvlMap<Uint8Array, Uint8Array>(cmpUint8Array);

  public get(key: Uint8Array): Uint8Array | undefined {
    return this.keys.get(key);
  }

  public set(key: Uint8Array, value: Uint8Array): void {
    this.keys.set(key.slice(), value.slice());
  }

  public del(key: Uint8Array): boolean {
    if (this.keys.get(key) === undefined) return false;
    this.keys.del(key);
    return true;
  }
}
