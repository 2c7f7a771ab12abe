import { Key } from '@nut-tree-fork/nut-js';
import keyAliases from '../data/key-aliases.json';
import charKeys from '../data/char-keys.json';

export interface KeyInfo {
  keyCode: Key;
  withShift: boolean;
}

const KEY_ALIASES: Record<string, string> = keyAliases;
const CHAR_KEYS: Record<string, { key: string; shift: boolean }> = charKeys;

// Lowercased nut-js key names; the numeric reverse entries of the enum are skipped
const NutKeyMapLowercase: Record<string, Key> = {};
for (const [name, value] of Object.entries(Key)) {
  if (typeof value === 'number') {
    NutKeyMapLowercase[name.toLowerCase()] = value;
  }
}

/**
 * Resolves a key name (alias or nut-js name, any case) to a nut-js key.
 */
export function resolveKey(name: string): Key {
  const lowerKey = name.trim().toLowerCase();
  const alias = KEY_ALIASES[lowerKey];
  const nutKey =
    alias !== undefined
      ? NutKeyMapLowercase[alias.toLowerCase()]
      : NutKeyMapLowercase[lowerKey];

  if (nutKey === undefined) {
    throw new Error(
      `Invalid key: '${name}'. Key not found in available key mappings.`,
    );
  }
  return nutKey;
}

/**
 * Converts a character to the key (and shift state) that produces it on a
 * US layout, or null if no mapping exists.
 */
export function charToKeyInfo(char: string): KeyInfo | null {
  if (/^[a-z0-9]$/.test(char)) {
    return { keyCode: resolveKey(char), withShift: false };
  }
  if (/^[A-Z]$/.test(char)) {
    return { keyCode: resolveKey(char.toLowerCase()), withShift: true };
  }

  const mapped = CHAR_KEYS[char];
  if (!mapped) {
    return null;
  }
  return { keyCode: resolveKey(mapped.key), withShift: mapped.shift };
}
