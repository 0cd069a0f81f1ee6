import { describe, expect, test } from 'vitest';

import type { MouseButton } from '../types/index.js';

import { ButtonMap } from './ButtonMap.js';
import { MOUSE_BUTTONS } from './constants.js';

test('pressedButton should return null if no buttons are pressed', () => {
  // Arrange
  const map = new ButtonMap();

  // Act
  const pressed = map.pressedButton();

  // Assert
  expect(pressed).toBeNull();
});

test('a new ButtonMap should report every button as up', () => {
  // Arrange
  const map = new ButtonMap();

  // Assert
  for (const button of MOUSE_BUTTONS) {
    expect(map.get(button)).toBeNull();
    expect(map.isDown(button)).toBe(false);
  }
});

test('pressedButton should return the first pressed button', () => {
  // Arrange
  const map = new ButtonMap();

  // Act
  map.set('right', { x: 3, y: 3 });
  map.set('x1', { x: 5.4, y: 4.5 });

  // Assert
  expect(map.pressedButton()).toEqual({ button: 'right', position: { x: 3, y: 3 } });
});

test('pressedButton should not depend on the order buttons were pressed in', () => {
  // Arrange
  const map = new ButtonMap();

  // Act
  map.set('button8', { x: 1, y: 1 });
  map.set('middle', { x: 2, y: 2 });
  map.set('x2', { x: 3, y: 3 });

  // Assert
  expect(map.pressedButton()).toEqual({ button: 'middle', position: { x: 2, y: 2 } });
});

test('pressedButton should find the unknown button at index 0', () => {
  // Arrange
  const map = new ButtonMap();
  map.set('left', { x: 1, y: 1 });
  map.set('unknown', { x: 9, y: 9 });

  // Act
  const pressed = map.pressedButton();

  // Assert
  expect(pressed?.button).toBe('unknown');
});

test('button down should store the point', () => {
  // Arrange
  const map = new ButtonMap();
  const point = { x: 2, y: 5 };

  // Act
  map.set('left', point);

  // Assert
  expect(map.get('left')).toEqual(point);
  expect(map.isDown('left')).toBe(true);
});

test('setting a button to null should mark it as up', () => {
  // Arrange
  const map = new ButtonMap();
  map.set('left', { x: 2, y: 5 });

  // Act
  map.set('left', null);

  // Assert
  expect(map.get('left')).toBeNull();
  expect(map.pressedButton()).toBeNull();
});

test('set should overwrite a button that is already down', () => {
  // Arrange
  const map = new ButtonMap();
  map.set('middle', { x: 1, y: 1 });

  // Act
  map.set('middle', { x: 7, y: 8 });

  // Assert
  expect(map.get('middle')).toEqual({ x: 7, y: 8 });
});

test('take resets and returns current state', () => {
  // Arrange
  const map = new ButtonMap();
  const point = { x: 2, y: 5 };
  map.set('left', point);

  // Act
  const taken = map.take('left');

  // Assert
  expect(taken).toEqual(point);
  expect(map.get('left')).toBeNull();
});

test('take on a button that is up should return null and leave it up', () => {
  // Arrange
  const map = new ButtonMap();

  // Act
  const taken = map.take('x2');

  // Assert
  expect(taken).toBeNull();
  expect(map.get('x2')).toBeNull();
});

test('take should only clear the requested button', () => {
  // Arrange
  const map = new ButtonMap();
  map.set('left', { x: 1, y: 2 });
  map.set('right', { x: 3, y: 4 });

  // Act
  map.take('left');

  // Assert
  expect(map.get('right')).toEqual({ x: 3, y: 4 });
  expect(map.pressedButton()).toEqual({ button: 'right', position: { x: 3, y: 4 } });
});

describe('ButtonMap copies', () => {
  test('stored positions should not follow mutations of the argument', () => {
    // Arrange
    const map = new ButtonMap();
    const point = { x: 1, y: 1 };
    map.set('left', point);

    // Act
    point.x = 100;

    // Assert
    expect(map.get('left')).toEqual({ x: 1, y: 1 });
  });

  test('returned positions should not write back into the map', () => {
    // Arrange
    const map = new ButtonMap();
    map.set('left', { x: 1, y: 1 });

    // Act
    const read = map.get('left');
    if (read) {
      read.y = 50;
    }

    // Assert
    expect(map.get('left')).toEqual({ x: 1, y: 1 });
  });

  test('clone should be independent of the original', () => {
    // Arrange
    const map = new ButtonMap();
    map.set('right', { x: 4, y: 4 });

    // Act
    const copy = map.clone();
    map.set('right', null);
    copy.set('left', { x: 0, y: 0 });

    // Assert
    expect(copy.get('right')).toEqual({ x: 4, y: 4 });
    expect(map.get('left')).toBeNull();
  });

  test('equals should compare every slot by position', () => {
    // Arrange
    const a = new ButtonMap();
    const b = new ButtonMap();
    const buttons: MouseButton[] = ['left', 'x1'];
    for (const button of buttons) {
      a.set(button, { x: 1, y: 2 });
      b.set(button, { x: 1, y: 2 });
    }

    // Assert
    expect(a.equals(b)).toBe(true);

    // Act
    b.set('x1', { x: 1, y: 3 });

    // Assert
    expect(a.equals(b)).toBe(false);
  });
});
