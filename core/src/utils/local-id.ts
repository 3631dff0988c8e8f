import { randomInt } from 'node:crypto';

const ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export type RandomIndex = (max: number) => number;

export const GENERATED_NOTE_ID_PATTERN = /^[0-9]{2}[a-z0-9]{3}$/;
export const GENERATED_CHAT_ID_PATTERN = /^[0-9]{6}[a-z0-9]{6}$/;

/**
 * Local id made of the trailing digits of the current unix time followed by
 * random lowercase alphanumerics. Ids are unique only within a tenant, and
 * callers are expected to check for collisions.
 */
export function generateLocalId(
  timestampDigits: number,
  randomLength: number,
  now: Date = new Date(),
  random: RandomIndex = randomInt
): string {
  const seconds = String(Math.floor(now.getTime() / 1000));
  const prefix = seconds.slice(-timestampDigits).padStart(timestampDigits, '0');

  let suffix = '';
  for (let i = 0; i < randomLength; i++) {
    suffix += ID_ALPHABET.charAt(random(ID_ALPHABET.length));
  }
  return `${prefix}${suffix}`;
}

/** Zettelkasten-style note id, e.g. `42k7q` */
export function generateNoteId(now?: Date, random?: RandomIndex): string {
  return generateLocalId(2, 3, now, random);
}

/** Conversation and message id, e.g. `735042ab12cd` */
export function generateChatId(now?: Date, random?: RandomIndex): string {
  return generateLocalId(6, 6, now, random);
}
