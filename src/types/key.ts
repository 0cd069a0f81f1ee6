/**
 * Keys that act as modifiers. Each side of the keyboard has its own identity,
 * but both sides of a pair set the same {@link ModifierKey} bit.
 */
export type ModifierKeyCode = 'lctrl' | 'rctrl' | 'lshift' | 'rshift' | 'lalt' | 'ralt' | 'lgui' | 'rgui';

type LetterKey =
  | 'a'
  | 'b'
  | 'c'
  | 'd'
  | 'e'
  | 'f'
  | 'g'
  | 'h'
  | 'i'
  | 'j'
  | 'k'
  | 'l'
  | 'm'
  | 'n'
  | 'o'
  | 'p'
  | 'q'
  | 'r'
  | 's'
  | 't'
  | 'u'
  | 'v'
  | 'w'
  | 'x'
  | 'y'
  | 'z';

type DigitKey = `d${0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9}`;

type FunctionKey = `f${1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12}`;

type NavigationKey = 'up' | 'down' | 'left' | 'right' | 'home' | 'end' | 'pageup' | 'pagedown';

type EditingKey = 'return' | 'escape' | 'backspace' | 'delete' | 'insert' | 'tab' | 'space' | 'capslock';

/**
 * A physical keyboard key as reported by the event source.
 *
 * Letters are named by their lowercase character, digits as `d0`..`d9`, and
 * function keys as `f1`..`f12`. Keys the source cannot name map to `'unknown'`.
 */
export type Key = ModifierKeyCode | LetterKey | DigitKey | FunctionKey | NavigationKey | EditingKey | 'unknown';

/**
 * A single modifier bit: `CTRL`, `SHIFT`, `ALT` or `GUI`.
 */
export type ModifierFlag = 0b0001 | 0b0010 | 0b0100 | 0b1000;

/**
 * Bitset of held modifier keys. Combine the `CTRL`, `SHIFT`, `ALT` and `GUI`
 * bits with the helpers in `core/modifier`.
 */
export type ModifierKey = number;
