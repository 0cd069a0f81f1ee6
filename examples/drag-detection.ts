import { InputTracker, type Point, type UiEvent } from '../src/index.js';

/**
 * This example shows how a widget can use the tracked input state to tell a
 * drag from a click.
 *
 * A scripted sequence of events stands in for the windowing layer. The widget
 * lives at (100, 100) and works in its own coordinates, so it reads the state
 * through `relativeTo`. Button press positions stay in screen coordinates.
 *
 * Run with:
 * - npm run example
 */

// Minimum distance (in pixels) the mouse must travel while pressed to count as a drag
const DRAG_THRESHOLD = 4;

const WIDGET_ID = 1;
const WIDGET_ORIGIN: Point = { x: 100, y: 100 };

const events: UiEvent[] = [
  { type: 'raw', input: { action: 'move', motion: { kind: 'mouse-cursor', x: 110, y: 120 } } },
  { type: 'raw', input: { action: 'press', button: { kind: 'keyboard', key: 'lshift' } } },
  { type: 'raw', input: { action: 'press', button: { kind: 'mouse', button: 'left' } } },
  { type: 'widget-captures-mouse', widget: WIDGET_ID },
  { type: 'raw', input: { action: 'move', motion: { kind: 'mouse-cursor', x: 112, y: 121 } } },
  { type: 'raw', input: { action: 'move', motion: { kind: 'mouse-cursor', x: 130, y: 140 } } },
  { type: 'raw', input: { action: 'release', button: { kind: 'mouse', button: 'left' } } },
  { type: 'widget-uncaptures-mouse', widget: WIDGET_ID },
  { type: 'raw', input: { action: 'release', button: { kind: 'keyboard', key: 'rshift' } } },
];

const tracker = new InputTracker();

tracker.on('change', ({ current }) => {
  const local = current.relativeTo(WIDGET_ORIGIN);
  const pressed = current.mouseButtons.pressedButton();

  if (pressed && current.widgetCapturingMouse === WIDGET_ID) {
    const dx = current.mousePosition.x - pressed.position.x;
    const dy = current.mousePosition.y - pressed.position.y;
    const dragging = Math.hypot(dx, dy) >= DRAG_THRESHOLD;
    console.log(
      `${dragging ? 'DRAG ' : 'HOLD '} ${pressed.button} at local (${local.mousePosition.x}, ${local.mousePosition.y})`,
    );
  } else {
    console.log(`IDLE  mouse at local (${local.mousePosition.x}, ${local.mousePosition.y})`);
  }
});

tracker.on('error', (error) => {
  console.error('Listener failed:', error.message);
});

for (const event of events) {
  tracker.dispatch(event);
}

tracker.destroy();
