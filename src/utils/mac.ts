import type { Oui } from '../types/vendor.js';

export const ZERO_ADDRESS = '00:00:00:00:00:00';

const OCTET_PATTERN = /^[0-9A-Fa-f]{2}$/;

export function formatOctet(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`Octet out of range: ${value}`);
  }
  return value.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Accepts `AA BB CC` as three tokens or `AA:BB:CC` / `AA-BB-CC` as one.
 * Returns null unless exactly three hex octets are present.
 */
export function parseOui(tokens: readonly string[]): Oui | null {
  const octets = tokens.length === 1 ? (tokens[0] ?? '').split(/[:-]/) : [...tokens];
  if (octets.length !== 3) return null;

  const [first, second, third] = octets;
  if (first === undefined || second === undefined || third === undefined) return null;
  if (!octets.every(octet => OCTET_PATTERN.test(octet))) return null;

  return [first.toUpperCase(), second.toUpperCase(), third.toUpperCase()];
}

export function ouiToString(oui: Oui): string {
  return oui.join(':');
}

/** M bit: least significant bit of the first octet. */
export function hasMulticastBit(oui: Oui): boolean {
  return (parseInt(oui[0], 16) & 0b01) !== 0;
}

/** X bit: second least significant bit of the first octet. */
export function hasLocalBit(oui: Oui): boolean {
  return (parseInt(oui[0], 16) & 0b10) !== 0;
}
