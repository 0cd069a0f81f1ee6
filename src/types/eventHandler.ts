import type { InputState } from '../core/InputState.js';
import type { InputStateError } from './error.js';
import type { UiEvent } from './event.js';

/**
 * Names of the events an {@link InputTracker} emits.
 *
 * | Name | Description |
 * |------|-------------|
 * | `'change'` | A dispatched event altered the tracked state |
 * | `'error'` | A `'change'` listener threw |
 */
export type TrackerEventName = 'change' | 'error';

/**
 * Payload of a `'change'` notification. `previous` and `current` are snapshots
 * and can be kept without being affected by later events.
 *
 * @property event - The event that caused the change, or `null` after a reset
 */
export type InputChange = {
  event: UiEvent | null;
  previous: InputState;
  current: InputState;
};

/**
 * Maps tracker event names to their payload types.
 *
 * @example
 * ```ts
 * type ChangePayload = TrackerEventTypeMap['change'];
 * // ChangePayload is InputChange
 * ```
 */
export type TrackerEventTypeMap = {
  change: InputChange;
  error: InputStateError;
};

/**
 * Extracts the listener type for a given tracker event name.
 *
 * @example
 * ```ts
 * const onChange: ListenerFor<'change'> = ({ current }) => {
 *   console.log(current.mousePosition);
 * };
 * ```
 */
export type ListenerFor<T extends TrackerEventName> = (payload: TrackerEventTypeMap[T]) => void;
