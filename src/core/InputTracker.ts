import { EventEmitter } from 'node:events';
import { InputStateError } from '../types/error.js';
import type { UiEvent } from '../types/event.js';
import type { InputChange, ListenerFor, TrackerEventName } from '../types/eventHandler.js';
import type { Point } from '../types/point.js';
import { InputState } from './InputState.js';

/**
 * Owns the canonical {@link InputState} of a toolkit's event loop.
 *
 * Events are applied in the order they are dispatched. Listeners are notified
 * synchronously with snapshots of the state before and after each change;
 * nothing outside the tracker ever holds the live state.
 */
class InputTracker {
  /**
   * Constructs a new InputTracker.
   * @param emitter The event emitter used for notifications (defaults to a new EventEmitter).
   * @param state The state to start from (defaults to a fresh state). The tracker keeps its own copy.
   */
  constructor(
    private emitter: EventEmitter = new EventEmitter(),
    private state: InputState = InputState.new(),
  ) {
    this.state = state.clone();
  }

  /**
   * Applies an event to the tracked state and emits `'change'` if the state
   * was altered.
   *
   * **Error Handling:** an exception thrown by a `'change'` listener does not
   * propagate out of `dispatch`. It is wrapped in an {@link InputStateError} and
   * emitted as `'error'`; the state keeps the update. As with any
   * `EventEmitter`, an `'error'` with no listener is thrown.
   *
   * @example
   * ```ts
   * const tracker = new InputTracker();
   * tracker.on('change', ({ current }) => {
   *   console.log(current.mouseButtons.pressedButton());
   * });
   * tracker.dispatch({ type: 'raw', input: { action: 'press', button: { kind: 'mouse', button: 'left' } } });
   * ```
   */
  public dispatch = (event: UiEvent): void => {
    const previous = this.state.clone();
    this.state.update(event);
    this.notify(event, previous);
  };

  /**
   * Returns a snapshot of the tracked state.
   */
  public current(): InputState {
    return this.state.clone();
  }

  /**
   * Returns a snapshot of the tracked state with the mouse position made
   * relative to `origin`.
   * @see {@link InputState.relativeTo}
   */
  public relativeTo(origin: Point): InputState {
    return this.state.relativeTo(origin);
  }

  /**
   * Replaces the tracked state with a fresh one, for instance after the window
   * lost focus and button releases may have been missed.
   */
  public reset(): void {
    const previous = this.state;
    this.state = InputState.new();
    this.notify(null, previous);
  }

  /**
   * Registers a listener for a tracker event.
   * @param event The name of the event to listen for.
   * @param listener The callback function to execute when the event is triggered.
   * @returns The event emitter instance.
   * @see {@link off} to remove the listener
   */
  public on = <T extends TrackerEventName>(event: T, listener: ListenerFor<T>): EventEmitter => {
    return this.emitter.on(event, listener);
  };

  /**
   * Removes a listener for a tracker event.
   * @param event The name of the event to stop listening for.
   * @param listener The callback function to remove.
   * @returns The event emitter instance.
   */
  public off = <T extends TrackerEventName>(event: T, listener: ListenerFor<T>): EventEmitter => {
    return this.emitter.off(event, listener);
  };

  /**
   * Removes all listeners. The tracked state is kept.
   */
  public destroy(): void {
    this.emitter.removeAllListeners();
  }

  private notify(event: UiEvent | null, previous: InputState): void {
    if (previous.equals(this.state)) {
      return;
    }

    const change: InputChange = { event, previous, current: this.state.clone() };
    try {
      this.emitter.emit('change', change);
    } catch (err) {
      this.emitter.emit(
        'error',
        new InputStateError(
          `Input change listener failed: ${err instanceof Error ? err.message : String(err)}`,
          err instanceof Error ? err : undefined,
        ),
      );
    }
  }
}

export { InputTracker };
