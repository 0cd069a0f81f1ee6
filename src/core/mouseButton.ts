import type { MouseButton } from '../types/button.js';
import { InputStateError } from '../types/error.js';
import { MOUSE_BUTTON_INDEX, MOUSE_BUTTONS } from './constants.js';

/**
 * Converts a mouse button to its dense index in `[0, NUM_MOUSE_BUTTONS)`.
 */
export function mouseButtonIndex(button: MouseButton): number {
  return MOUSE_BUTTON_INDEX[button];
}

/**
 * Converts a dense index back to its mouse button.
 *
 * @throws {InputStateError} If `index` is not an integer in `[0, NUM_MOUSE_BUTTONS)`.
 */
export function mouseButtonFromIndex(index: number): MouseButton {
  const button = Number.isInteger(index) ? MOUSE_BUTTONS[index] : undefined;
  if (button === undefined) {
    throw new InputStateError(`Invalid mouse button index: ${index}`);
  }
  return button;
}
