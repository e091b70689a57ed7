import { decodeExtendedKey } from './decode';
import { deriveChild } from './derive';
import { ConfigError, DecodeError, DeriveError, EncodeError } from './errors';
import { erase } from './memory';
import { parsePath } from './path';
import { err, flatMap, Result } from './result';
import { Base58Codec, DerivationPath, DeriverOptions, ExtendedKeyMaterial } from './types';
import { encodeWif } from './wif';

export interface Deriver {
  decode(extendedKey: string): Result<ExtendedKeyMaterial, DecodeError | ConfigError>;
  encode(key: Buffer): Result<string, EncodeError | ConfigError>;
  deriveWif(extendedKey: string, path: string): Result<string, DeriveError>;
}

const missingCodec = () => err(new ConfigError('MISSING_CODEC', 'No base58check codec configured. Pass one to createDeriver({ codec }).'));

const wipe = (material: ExtendedKeyMaterial) => erase.buffers(material.key, material.chainCode);

export const createDeriver = (options: DeriverOptions = {}): Deriver => {
  const codec: Base58Codec | undefined = options.codec;

  const decode = (extendedKey: string): Result<ExtendedKeyMaterial, DecodeError | ConfigError> =>
    codec ? decodeExtendedKey(codec, extendedKey) : missingCodec();

  const encode = (key: Buffer): Result<string, EncodeError | ConfigError> => (codec ? encodeWif(codec, key) : missingCodec());

  const deriveWif = (extendedKey: string, path: string): Result<string, DeriveError> =>
    flatMap<ExtendedKeyMaterial, string, DeriveError>(decode(extendedKey), material => {
      try {
        return flatMap<DerivationPath, string, DeriveError>(parsePath(path), steps => {
          const child = deriveChild(material, steps, wipe);
          try {
            return encode(child.key);
          } finally {
            wipe(child);
          }
        });
      } finally {
        wipe(material);
      }
    });

  return { decode, encode, deriveWif };
};

export { decodeExtendedKey } from './decode';
export { deriveChild, deriveStep } from './derive';
export { ConfigError, DecodeError, EncodeError, PathError } from './errors';
export type { DeriveError } from './errors';
export { formatPath, parsePath, HARDENED_OFFSET } from './path';
export type { Result } from './result';
export type { Base58Codec, DerivationPath, DerivationStep, ExtendedKeyMaterial } from './types';
export { encodeWif, WIF_VERSION } from './wif';
