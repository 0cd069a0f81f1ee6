import type { MouseButton } from './button.js';
import type { Key } from './key.js';
import type { WidgetIndex } from './widget.js';

/**
 * The physical button behind a raw press or release.
 *
 * The `kind` property discriminates between mouse buttons and keyboard keys.
 */
export type Button = { kind: 'mouse'; button: MouseButton } | { kind: 'keyboard'; key: Key };

/**
 * Pointer motion reported by the event source.
 *
 * | Kind | Description |
 * |------|-------------|
 * | `'mouse-cursor'` | New absolute cursor coordinates |
 * | `'mouse-relative'` | Raw motion delta, independent of the cursor |
 * | `'mouse-scroll'` | Scroll wheel or trackpad delta |
 */
export type Motion =
  | { kind: 'mouse-cursor'; x: number; y: number }
  | { kind: 'mouse-relative'; dx: number; dy: number }
  | { kind: 'mouse-scroll'; dx: number; dy: number };

/**
 * Raw input as it arrives from the windowing layer, before the toolkit has
 * interpreted it.
 *
 * | Action | Description |
 * |--------|-------------|
 * | `'press'` | A mouse button or key went down |
 * | `'release'` | A mouse button or key went up |
 * | `'move'` | The pointer moved or scrolled |
 * | `'text'` | Text was entered |
 * | `'resize'` | The window was resized |
 * | `'focus'` | The window gained or lost focus |
 */
export type RawInput =
  | { action: 'press'; button: Button }
  | { action: 'release'; button: Button }
  | { action: 'move'; motion: Motion }
  | { action: 'text'; text: string }
  | { action: 'resize'; width: number; height: number }
  | { action: 'focus'; focused: boolean };

/**
 * An event distributed by the toolkit. Raw input is wrapped in a `'raw'` event;
 * the widget tree adds capture notifications and its own interpreted events.
 *
 * The `type` property is the discriminant.
 *
 * @example
 * ```ts
 * const press: UiEvent = {
 *   type: 'raw',
 *   input: { action: 'press', button: { kind: 'mouse', button: 'left' } },
 * };
 * const capture: UiEvent = { type: 'widget-captures-keyboard', widget: 7 };
 * ```
 */
export type UiEvent =
  | { type: 'raw'; input: RawInput }
  | { type: 'widget-captures-keyboard'; widget: WidgetIndex }
  | { type: 'widget-uncaptures-keyboard'; widget: WidgetIndex }
  | { type: 'widget-captures-mouse'; widget: WidgetIndex }
  | { type: 'widget-uncaptures-mouse'; widget: WidgetIndex }
  | { type: 'text-entered'; widget: WidgetIndex; text: string }
  | { type: 'window-resized'; width: number; height: number };

/**
 * Narrows a {@link UiEvent} to the variant with the given `type`.
 */
export type UiEventOf<T extends UiEvent['type']> = Extract<UiEvent, { type: T }>;
