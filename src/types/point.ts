/**
 * A position on screen, or within a widget's local coordinate space after
 * {@link InputState.relativeTo} has been applied.
 *
 * @property x - Horizontal coordinate
 * @property y - Vertical coordinate
 */
export type Point = {
  x: number;
  y: number;
};

/**
 * Position of the mouse when a button was pressed, or `null` while the button is up.
 */
export type ButtonDownPosition = Point | null;
