import { expect, test } from 'vitest';

import { InputStateError } from '../types/index.js';

import { MOUSE_BUTTONS, NUM_MOUSE_BUTTONS } from './constants.js';
import { mouseButtonFromIndex, mouseButtonIndex } from './mouseButton.js';

test('every mouse button should have a distinct index below NUM_MOUSE_BUTTONS', () => {
  // Act
  const indices = MOUSE_BUTTONS.map(mouseButtonIndex);

  // Assert
  expect(MOUSE_BUTTONS).toHaveLength(NUM_MOUSE_BUTTONS);
  expect(indices).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
});

test('mouseButtonFromIndex should invert mouseButtonIndex', () => {
  // Assert
  for (const button of MOUSE_BUTTONS) {
    expect(mouseButtonFromIndex(mouseButtonIndex(button))).toBe(button);
  }
});

test('right should come before x1 in index order', () => {
  // Assert
  expect(mouseButtonIndex('right')).toBe(2);
  expect(mouseButtonIndex('x1')).toBe(4);
});

test('mouseButtonFromIndex should throw InputStateError for out of range indices', () => {
  // Assert
  expect(() => mouseButtonFromIndex(9)).toThrow(InputStateError);
  expect(() => mouseButtonFromIndex(-1)).toThrow('Invalid mouse button index: -1');
  expect(() => mouseButtonFromIndex(1.5)).toThrow('Invalid mouse button index: 1.5');
});
