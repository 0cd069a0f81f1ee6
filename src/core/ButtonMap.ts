import type { MouseButton, PressedButton } from '../types/button.js';
import type { ButtonDownPosition, Point } from '../types/point.js';
import { MOUSE_BUTTONS, NUM_MOUSE_BUTTONS } from './constants.js';
import { mouseButtonIndex } from './mouseButton.js';

const copyPosition = (position: ButtonDownPosition): ButtonDownPosition =>
  position === null ? null : { x: position.x, y: position.y };

/**
 * Stores the state of every mouse button. While a button is down, its slot
 * holds the position of the mouse when the button was pressed.
 *
 * Positions are copied on `set` and on every read; a stored point is never
 * shared with a caller.
 */
class ButtonMap {
  private readonly buttonStates: ButtonDownPosition[];

  /**
   * Creates a map with every button up.
   */
  constructor() {
    this.buttonStates = new Array<ButtonDownPosition>(NUM_MOUSE_BUTTONS).fill(null);
  }

  /**
   * Sets the state of a button. Overwrites whatever was stored before.
   */
  public set(button: MouseButton, position: ButtonDownPosition): void {
    this.buttonStates[mouseButtonIndex(button)] = copyPosition(position);
  }

  /**
   * Returns where `button` was pressed, or `null` if it is up.
   */
  public get(button: MouseButton): ButtonDownPosition {
    return copyPosition(this.buttonStates[mouseButtonIndex(button)] ?? null);
  }

  /**
   * Returns the state of `button` and leaves it up.
   */
  public take(button: MouseButton): ButtonDownPosition {
    const idx = mouseButtonIndex(button);
    const position = this.buttonStates[idx] ?? null;
    this.buttonStates[idx] = null;
    return position;
  }

  public isDown(button: MouseButton): boolean {
    return this.buttonStates[mouseButtonIndex(button)] != null;
  }

  /**
   * If any button is down, returns the one with the lowest index together with
   * the position it was pressed at. Returns `null` when every button is up.
   *
   * @example
   * ```ts
   * const map = new ButtonMap();
   * map.set('x1', { x: 5, y: 4 });
   * map.set('right', { x: 3, y: 3 });
   * map.pressedButton(); // { button: 'right', position: { x: 3, y: 3 } }
   * ```
   */
  public pressedButton(): PressedButton | null {
    for (let idx = 0; idx < NUM_MOUSE_BUTTONS; idx++) {
      const position = this.buttonStates[idx];
      const button = MOUSE_BUTTONS[idx];
      if (position != null && button !== undefined) {
        return { button, position: { x: position.x, y: position.y } };
      }
    }
    return null;
  }

  /**
   * Returns an independent copy of this map.
   */
  public clone(): ButtonMap {
    const copy = new ButtonMap();
    this.buttonStates.forEach((position, idx) => {
      copy.buttonStates[idx] = copyPosition(position);
    });
    return copy;
  }

  public equals(other: ButtonMap): boolean {
    return this.buttonStates.every((position, idx) => samePosition(position, other.buttonStates[idx] ?? null));
  }
}

function samePosition(a: ButtonDownPosition, b: ButtonDownPosition): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return samePoint(a, b);
}

function samePoint(a: Point, b: Point): boolean {
  return Object.is(a.x, b.x) && Object.is(a.y, b.y);
}

export { ButtonMap, samePoint };
