import bs58 from 'bs58';
import * as crypto from 'crypto';
import { Result } from '../result';

// version 04358394 (tprv), depth 0, no parent, chain code 0x11 * 32, key 0x00 * 31 ‖ 0x01
export const TPRV =
  'tprv8ZgxMBicQKsPd3SoCPE73SbE2G9ric6PHhwwWKbuzh9usTeEomexnVTFJZMnwuVRmKGRqd4mjsDYbT85WdNwdiE7q1uTLEYa9YefLXgsiZi';
export const TPRV_KEY = Buffer.concat([Buffer.alloc(31, 0x00), Buffer.from([0x01])]);
export const TPRV_CHAIN_CODE = Buffer.alloc(32, 0x11);

// TPRV derived along m/0h/1
export const DERIVED_KEY = Buffer.from('ff1ee695f3a4531b2acca429157b1d152ac553d576ed38b33339b79e4f2c2db5', 'hex');
export const DERIVED_WIF = 'cW8d5sfj7BA5PQTjq4MGxF5ctEfth6Z6iG5W8wzmk1LeapHxorxr';

export const BASE58 = /^[1-9A-HJ-NP-Za-km-z]+$/;

export const sha256d = (data: Buffer): Buffer =>
  crypto.createHash('sha256').update(crypto.createHash('sha256').update(data).digest()).digest();

/** base58check-encode without going through the code under test. */
export const toBase58Check = (payload: Buffer): string =>
  bs58.encode(Buffer.concat([payload, sha256d(payload).subarray(0, 4)]));

export const extendedKeyPayload = (chainCode: Buffer, key: Buffer): Buffer =>
  Buffer.concat([
    Buffer.from('04358394', 'hex'),
    Buffer.from([0x00]),
    Buffer.alloc(4),
    Buffer.alloc(4),
    chainCode,
    Buffer.from([0x00]),
    key
  ]);

export const expectOk = <T, E>(result: Result<T, E>): T => {
  if (!result.ok) throw new Error(`Expected Ok, got ${String(result.error)}`);
  return result.value;
};

export const expectErr = <T, E>(result: Result<T, E>): E => {
  if (result.ok) throw new Error('Expected Err, got Ok');
  return result.error;
};
