import type { Button, UiEvent } from '../types/event.js';
import type { ModifierKey } from '../types/key.js';
import type { Point } from '../types/point.js';
import type { WidgetIndex } from '../types/widget.js';
import { ButtonMap, samePoint } from './ButtonMap.js';
import { getModifier, insertModifier, NO_MODIFIER, removeModifier } from './modifier.js';

/**
 * Holds the current state of user input: the up/down state and press position
 * of every mouse button, the position of the mouse, the held modifier keys, and
 * which widgets, if any, are capturing the keyboard and the mouse.
 *
 * The state is a plain value owned by the event loop. Use {@link clone} or
 * {@link relativeTo} to hand a copy to anything else.
 */
class InputState {
  /**
   * Up/down state of each mouse button. A button that is down stores the mouse
   * position at the moment it was pressed.
   */
  public mouseButtons: ButtonMap = new ButtonMap();
  /** The current position of the mouse. */
  public mousePosition: Point = { x: 0, y: 0 };
  /** Which widget, if any, is currently capturing the keyboard. */
  public widgetCapturingKeyboard: WidgetIndex | null = null;
  /** Which widget, if any, is currently capturing the mouse. */
  public widgetCapturingMouse: WidgetIndex | null = null;
  /** Which modifier keys are being held down. */
  public modifiers: ModifierKey = NO_MODIFIER;

  /**
   * Returns a fresh input state: mouse at the origin, no buttons or modifiers
   * held, nothing captured.
   */
  public static new(): InputState {
    return new InputState();
  }

  /**
   * Updates the state based on an event. Events that carry no input state are
   * ignored.
   *
   * Capture notifications always win: a capture replaces the current holder,
   * and an uncapture clears the slot whichever widget sent it.
   */
  public update(event: UiEvent): void {
    switch (event.type) {
      case 'raw': {
        const { input } = event;
        if (input.action === 'press') {
          this.press(input.button);
        } else if (input.action === 'release') {
          this.release(input.button);
        } else if (input.action === 'move' && input.motion.kind === 'mouse-cursor') {
          this.mousePosition = { x: input.motion.x, y: input.motion.y };
        }
        break;
      }
      case 'widget-captures-keyboard':
        this.widgetCapturingKeyboard = event.widget;
        break;
      case 'widget-uncaptures-keyboard':
        this.widgetCapturingKeyboard = null;
        break;
      case 'widget-captures-mouse':
        this.widgetCapturingMouse = event.widget;
        break;
      case 'widget-uncaptures-mouse':
        this.widgetCapturingMouse = null;
        break;
      default:
        break;
    }
  }

  /**
   * Returns a copy of the state with the mouse position expressed relative to
   * `origin`. Button press positions are left in their original coordinates.
   *
   * @example
   * ```ts
   * const state = InputState.new();
   * state.mousePosition = { x: 50, y: -10 };
   * state.relativeTo({ x: 20, y: 20 }).mousePosition; // { x: 30, y: -30 }
   * ```
   */
  public relativeTo(origin: Point): InputState {
    const relative = this.clone();
    relative.mousePosition = {
      x: this.mousePosition.x - origin.x,
      y: this.mousePosition.y - origin.y,
    };
    return relative;
  }

  /**
   * Returns an independent copy. Updating either state afterwards leaves the
   * other untouched.
   */
  public clone(): InputState {
    const copy = new InputState();
    copy.mouseButtons = this.mouseButtons.clone();
    copy.mousePosition = { x: this.mousePosition.x, y: this.mousePosition.y };
    copy.widgetCapturingKeyboard = this.widgetCapturingKeyboard;
    copy.widgetCapturingMouse = this.widgetCapturingMouse;
    copy.modifiers = this.modifiers;
    return copy;
  }

  public equals(other: InputState): boolean {
    return (
      this.mouseButtons.equals(other.mouseButtons) &&
      samePoint(this.mousePosition, other.mousePosition) &&
      this.widgetCapturingKeyboard === other.widgetCapturingKeyboard &&
      this.widgetCapturingMouse === other.widgetCapturingMouse &&
      this.modifiers === other.modifiers
    );
  }

  private press(button: Button): void {
    if (button.kind === 'mouse') {
      this.mouseButtons.set(button.button, this.mousePosition);
      return;
    }
    const modifier = getModifier(button.key);
    if (modifier !== null) {
      this.modifiers = insertModifier(this.modifiers, modifier);
    }
  }

  private release(button: Button): void {
    if (button.kind === 'mouse') {
      this.mouseButtons.set(button.button, null);
      return;
    }
    const modifier = getModifier(button.key);
    if (modifier !== null) {
      this.modifiers = removeModifier(this.modifiers, modifier);
    }
  }
}

export { InputState };
