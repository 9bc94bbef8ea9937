/**
 * Registry of supported bank profiles.
 */

import type { ProfileId } from '../types/index.js';
import type { BankProfile } from './types.js';
import { RAIFFEISEN_PROFILE } from './raiffeisen.js';
import { CREDITAS_PROFILE } from './creditas.js';
import { GENERIC_PROFILE } from './generic.js';

export const BANK_PROFILES: Readonly<Record<ProfileId, BankProfile>> = {
    raiffeisen: RAIFFEISEN_PROFILE,
    creditas: CREDITAS_PROFILE,
    generic: GENERIC_PROFILE,
};

/**
 * Detection order. The first structural match wins even if a later
 * profile would also match, so the most specific layouts come first.
 */
export const DETECTION_ORDER: readonly ProfileId[] = ['raiffeisen', 'creditas', 'generic'];

/**
 * Get list of supported profile ids, in detection order.
 */
export function getSupportedProfiles(): ProfileId[] {
    return [...DETECTION_ORDER];
}
