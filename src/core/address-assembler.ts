import { createChildLogger } from '../utils/logger.js';
import { ZERO_ADDRESS, formatOctet } from '../utils/mac.js';
import { randomByte, type RandomSource } from '../utils/random.js';
import type { GeneratedAddress, Oui } from '../types/vendor.js';

const logger = createChildLogger('address-assembler');

// FF:FF:FF is never assigned as an OUI, so the broadcast address cannot be produced
const ZERO_ADDRESS_REPLACEMENT = '00:00:00:00:00:01';

export function sanitizeAddress(address: string): { address: string; corrected: boolean } {
  if (address === ZERO_ADDRESS) {
    return { address: ZERO_ADDRESS_REPLACEMENT, corrected: true };
  }
  return { address, corrected: false };
}

/** Vendor prefix followed by three random device octets. */
export function assembleAddress(oui: Oui, random: RandomSource): GeneratedAddress {
  const suffix = [
    formatOctet(randomByte(random)),
    formatOctet(randomByte(random)),
    formatOctet(randomByte(random)),
  ] as const;

  const { address, corrected } = sanitizeAddress([...oui, ...suffix].join(':'));
  if (corrected) {
    logger.warn({ address }, 'Replaced reserved all-zero address');
  }

  return { oui, suffix, address, corrected };
}
