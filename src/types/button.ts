import type { Point } from './point.js';

/**
 * Represents a mouse button identifier.
 *
 * The order of this union is the order of the dense button index used by
 * {@link ButtonMap}; see `MOUSE_BUTTONS` for the table itself.
 *
 * | Button | Index | Description |
 * |--------|-------|-------------|
 * | `'unknown'` | 0 | Button the event source could not identify |
 * | `'left'` | 1 | Primary (left) mouse button |
 * | `'right'` | 2 | Secondary (right) mouse button |
 * | `'middle'` | 3 | Middle mouse button (often the scroll wheel click) |
 * | `'x1'` | 4 | First extra button (typically "back") |
 * | `'x2'` | 5 | Second extra button (typically "forward") |
 * | `'button6'` | 6 | Sixth button on mice that have one |
 * | `'button7'` | 7 | Seventh button |
 * | `'button8'` | 8 | Eighth button |
 */
export type MouseButton =
  | 'unknown'
  | 'left'
  | 'right'
  | 'middle'
  | 'x1'
  | 'x2'
  | 'button6'
  | 'button7'
  | 'button8';

/**
 * A pressed mouse button together with the position it was pressed at.
 */
export type PressedButton = {
  button: MouseButton;
  position: Point;
};
