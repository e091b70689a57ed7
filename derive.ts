import * as crypto from 'crypto';
import { DerivationPath, DerivationStep, ExtendedKeyMaterial } from './types';

/**
 * One CKDpriv step: HMAC-SHA512 keyed by the chain code over
 * `0x00 ‖ key ‖ uint32be(index)`. The left half becomes the child key and
 * the right half the child chain code.
 *
 * The private key goes into the message for normal steps too, and the left
 * half is used as the key directly rather than added to the parent key
 * modulo the curve order. Both differ from BIP32 for keys it would derive,
 * and are kept because existing keys were derived this way.
 */
export const deriveStep = (material: ExtendedKeyMaterial, step: DerivationStep): ExtendedKeyMaterial => {
  const index = Buffer.alloc(4);
  index.writeUInt32BE(step.index);
  const data = Buffer.concat([Buffer.from([0x00]), material.key, index]);
  const digest = crypto.createHmac('sha512', material.chainCode).update(data).digest();
  return {
    key: digest.subarray(0, 32),
    chainCode: digest.subarray(32)
  };
};

/**
 * Apply the steps of `path` in order. `release` receives every intermediate
 * pair once the next step has been derived from it; the input material and
 * the returned child are never passed to it.
 */
export const deriveChild = (
  material: ExtendedKeyMaterial,
  path: DerivationPath,
  release?: (superseded: ExtendedKeyMaterial) => void
): ExtendedKeyMaterial =>
  path.reduce((current, step) => {
    const next = deriveStep(current, step);
    if (release && current !== material) release(current);
    return next;
  }, material);
