export type { MouseButton, PressedButton } from './button.js';
export { InputStateError } from './error.js';
export type { Button, Motion, RawInput, UiEvent, UiEventOf } from './event.js';
export type { InputChange, ListenerFor, TrackerEventName, TrackerEventTypeMap } from './eventHandler.js';
export type { Key, ModifierFlag, ModifierKey, ModifierKeyCode } from './key.js';
export type { ButtonDownPosition, Point } from './point.js';
export type { WidgetIndex } from './widget.js';
