import { EncodeError } from './errors';
import { err, ok, Result } from './result';
import { Base58Codec } from './types';

export const WIF_VERSION = 0xef; // testnet / regtest
export const COMPRESSED_FLAG = 0x01;

export const encodeWif = (codec: Base58Codec, key: Buffer): Result<string, EncodeError> => {
  if (key.length !== 32) {
    return err(new EncodeError('INVALID_KEY_LENGTH', `Invalid private key length: expected 32 bytes, got ${key.length}.`));
  }
  return ok(codec.encode(Buffer.concat([Buffer.from([WIF_VERSION]), key, Buffer.from([COMPRESSED_FLAG])])));
};
