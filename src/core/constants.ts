import type { MouseButton } from '../types/button.js';
import type { ModifierFlag } from '../types/key.js';

/**
 * The max total number of buttons on a mouse.
 */
const NUM_MOUSE_BUTTONS = 9;

/**
 * Dense index of every mouse button. The object is checked against the full
 * {@link MouseButton} union, so adding a button without an index fails to compile.
 */
const MOUSE_BUTTON_INDEX = {
  unknown: 0,
  left: 1,
  right: 2,
  middle: 3,
  x1: 4,
  x2: 5,
  button6: 6,
  button7: 7,
  button8: 8,
} as const satisfies Record<MouseButton, number>;

/**
 * Mouse buttons ordered by index: `MOUSE_BUTTONS[MOUSE_BUTTON_INDEX[b]] === b`.
 */
const MOUSE_BUTTONS: readonly MouseButton[] = [
  'unknown',
  'left',
  'right',
  'middle',
  'x1',
  'x2',
  'button6',
  'button7',
  'button8',
];

/**
 * Bits of the {@link ModifierKey} set. Left and right keys of a pair share a bit.
 */
const MODIFIER_BITS = {
  ctrl: 0b0001,
  shift: 0b0010,
  alt: 0b0100,
  gui: 0b1000,
} as const satisfies Record<string, ModifierFlag>;

export { MODIFIER_BITS, MOUSE_BUTTON_INDEX, MOUSE_BUTTONS, NUM_MOUSE_BUTTONS };
