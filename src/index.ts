export { ButtonMap } from './core/ButtonMap.js';
export { MODIFIER_BITS, MOUSE_BUTTON_INDEX, MOUSE_BUTTONS, NUM_MOUSE_BUTTONS } from './core/constants.js';
export { InputState } from './core/InputState.js';
export { InputTracker } from './core/InputTracker.js';
export {
  ALT,
  CTRL,
  GUI,
  getModifier,
  hasModifier,
  insertModifier,
  modifierNames,
  NO_MODIFIER,
  removeModifier,
  SHIFT,
} from './core/modifier.js';
export { mouseButtonFromIndex, mouseButtonIndex } from './core/mouseButton.js';
export * from './types/index.js';
