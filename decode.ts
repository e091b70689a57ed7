import { DecodeError } from './errors';
import { err, ok, Result } from './result';
import { Base58Codec, ExtendedKeyMaterial } from './types';

// version(4) depth(1) fingerprint(4) child(4) chain code(32) 0x00 key(32)
export const EXTENDED_KEY_LENGTH = 78;
const CHAIN_CODE_OFFSET = 13;
const KEY_OFFSET = 46;

const decodeCheck = (codec: Base58Codec, text: string): Result<Buffer, DecodeError> => {
  try {
    return ok(Buffer.from(codec.decode(text)));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return /checksum/i.test(message)
      ? err(new DecodeError('CHECKSUM_MISMATCH', 'Extended key checksum does not match.'))
      : err(new DecodeError('INVALID_BASE58', 'Extended key is not valid base58.'));
  }
};

export const decodeExtendedKey = (codec: Base58Codec, text: string): Result<ExtendedKeyMaterial, DecodeError> => {
  const decoded = decodeCheck(codec, text);
  if (!decoded.ok) return decoded;
  const payload = decoded.value;
  if (payload.length !== EXTENDED_KEY_LENGTH) {
    return err(new DecodeError('INVALID_LENGTH', `Extended key must decode to ${EXTENDED_KEY_LENGTH} bytes, got ${payload.length}.`));
  }
  return ok({
    chainCode: Buffer.from(payload.subarray(CHAIN_CODE_OFFSET, CHAIN_CODE_OFFSET + 32)),
    key: Buffer.from(payload.subarray(KEY_OFFSET, KEY_OFFSET + 32))
  });
};
