export interface ExtendedKeyMaterial {
  readonly key: Buffer; // 32-byte private scalar
  readonly chainCode: Buffer; // 32 bytes
}

export interface DerivationStep {
  readonly index: number; // hardened steps carry the 0x80000000 offset
  readonly hardened: boolean;
}

export type DerivationPath = readonly DerivationStep[];

/**
 * Base58check codec: `encode` appends the double-SHA256 checksum and
 * `decode` verifies and strips it, throwing on bad input. The `bs58check`
 * package satisfies it as is.
 */
export interface Base58Codec {
  encode(payload: Uint8Array): string;
  decode(text: string): Uint8Array;
}

export interface DeriverOptions {
  codec?: Base58Codec;
}

export interface Output {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}
