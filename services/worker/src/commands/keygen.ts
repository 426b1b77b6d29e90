import { ENCRYPTION_KEY_ENV } from '@question-pool/core';
import { generateKey } from '@question-pool/store';

/**
 * Print a fresh encryption key in `.env` form
 */
export function runKeygen(): string {
  const key = generateKey();
  console.log(`${ENCRYPTION_KEY_ENV}=${key}`);
  return key;
}
