/**
 * Opaque handle to a widget in the toolkit's widget tree.
 *
 * Input state only stores and compares these handles. It never looks the
 * widget up, so a handle may outlive the widget it names.
 */
export type WidgetIndex = number;
