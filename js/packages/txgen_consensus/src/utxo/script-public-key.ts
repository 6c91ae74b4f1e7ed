import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { ScriptPublicKey } from '../types/types';

/**
 * Hex form with a 2-byte big-endian version prefix, e.g. `0000` + script
 */
export function scriptPublicKeyToHex(spk: ScriptPublicKey): string {
  return spk.version.toString(16).padStart(4, '0') + bytesToHex(spk.script);
}

/**
 * @throws Error when the string is not even-length hex of at least two bytes
 */
export function scriptPublicKeyFromHex(hex: string): ScriptPublicKey {
  if (hex.length < 4) {
    throw new Error('Script public key hex must carry a 2-byte version prefix');
  }
  return {
    version: Number.parseInt(hex.slice(0, 4), 16),
    script: hexToBytes(hex.slice(4)),
  };
}
