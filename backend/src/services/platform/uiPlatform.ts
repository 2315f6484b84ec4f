/**
 * Platform port
 *
 * The automation core reaches the device UI only through this interface.
 * Every method that returns nodes hands out fresh handles which the caller
 * owns and must pass to {@link UiPlatform.recycle} exactly once.
 */

import type { NodeAction, UiNode } from '../../types/uiTree';

export interface UiPlatform {
  /** Root of the currently active window, or null when there is none */
  rootInActiveWindow(): Promise<UiNode | null>;
  /** Pre-order search of the subtree (node included) by view identifier */
  findByViewId(node: UiNode, viewId: string): UiNode[];
  /** Case-insensitive substring search over text and content description */
  findByText(node: UiNode, text: string): UiNode[];
  getChild(node: UiNode, index: number): UiNode | null;
  getParent(node: UiNode): UiNode | null;
  performAction(node: UiNode, action: NodeAction): Promise<boolean>;
  recycle(node: UiNode): void;
}

export interface HandleStats {
  issued: number;
  recycled: number;
  outstanding: number;
}
