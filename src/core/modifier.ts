import type { Key, ModifierFlag, ModifierKey } from '../types/key.js';
import { MODIFIER_BITS } from './constants.js';

export const NO_MODIFIER: ModifierKey = 0;
export const CTRL: ModifierFlag = MODIFIER_BITS.ctrl;
export const SHIFT: ModifierFlag = MODIFIER_BITS.shift;
export const ALT: ModifierFlag = MODIFIER_BITS.alt;
export const GUI: ModifierFlag = MODIFIER_BITS.gui;

/**
 * Returns the modifier bit a key sets while held, or `null` for keys that are
 * not modifiers.
 */
export function getModifier(key: Key): ModifierFlag | null {
  switch (key) {
    case 'lctrl':
    case 'rctrl':
      return CTRL;
    case 'lshift':
    case 'rshift':
      return SHIFT;
    case 'lalt':
    case 'ralt':
      return ALT;
    case 'lgui':
    case 'rgui':
      return GUI;
    default:
      return null;
  }
}

export function insertModifier(set: ModifierKey, flag: ModifierFlag): ModifierKey {
  return set | flag;
}

export function removeModifier(set: ModifierKey, flag: ModifierFlag): ModifierKey {
  return set & ~flag;
}

/**
 * True when `flag` is held in `set`.
 */
export function hasModifier(set: ModifierKey, flag: ModifierFlag): boolean {
  return (set & flag) !== NO_MODIFIER;
}

/**
 * Names of the held modifiers, in bit order.
 *
 * @example
 * ```ts
 * modifierNames(CTRL | ALT); // ['ctrl', 'alt']
 * ```
 */
export function modifierNames(set: ModifierKey): Array<keyof typeof MODIFIER_BITS> {
  const names: Array<keyof typeof MODIFIER_BITS> = ['ctrl', 'shift', 'alt', 'gui'];
  return names.filter((name) => hasModifier(set, MODIFIER_BITS[name]));
}
