import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

export function hasAddressFormat(address: string): boolean {
  return ADDRESS_REGEX.test(address);
}

/**
 * EIP-55 mixed-case checksum encoding of an Ethereum address.
 * Throws when the input is not 0x followed by 40 hex digits.
 */
export function toChecksumAddress(address: string): string {
  if (!ADDRESS_REGEX.test(address)) {
    throw new Error(`Not an Ethereum address: ${address}`);
  }

  const hex = address.slice(2).toLowerCase();
  const hash = bytesToHex(keccak_256(utf8ToBytes(hex)));

  let result = "0x";
  for (let i = 0; i < hex.length; i++) {
    const char = hex.charAt(i);
    result += parseInt(hash.charAt(i), 16) >= 8 ? char.toUpperCase() : char;
  }
  return result;
}

/**
 * All-lowercase and all-uppercase addresses carry no checksum and are
 * accepted as is; mixed case must match the EIP-55 encoding.
 */
export function isEthereumAddress(address: string): boolean {
  if (!ADDRESS_REGEX.test(address)) return false;

  const hex = address.slice(2);
  if (hex === hex.toLowerCase() || hex === hex.toUpperCase()) return true;
  return toChecksumAddress(address) === address;
}
