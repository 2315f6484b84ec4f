/**
 * UI tree types shared by the platform port, the node access layer and the
 * locator.
 */

export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Element of a parsed uiautomator hierarchy. Owned by the platform; callers
 * only ever see it through {@link UiNode} handles.
 */
export interface UiTreeNode {
  className: string | null;
  text: string | null;
  contentDescription: string | null;
  resourceId: string | null;
  packageName: string | null;
  clickable: boolean;
  enabled: boolean;
  focusable: boolean;
  longClickable: boolean;
  visible: boolean;
  bounds: Bounds;
  children: UiTreeNode[];
  parent: UiTreeNode | null;
}

/**
 * Transient handle into the current UI tree. Every query returns fresh
 * handles; each must be released exactly once.
 */
export interface UiNode {
  readonly className: string | null;
  readonly text: string | null;
  readonly contentDescription: string | null;
  readonly viewId: string | null;
  readonly clickable: boolean;
  readonly enabled: boolean;
  readonly visible: boolean;
  readonly bounds: Bounds;
  readonly childCount: number;
}

export type NodeAction = 'click' | 'long-click' | 'focus' | 'accessibility-focus';

export type MatchCriteria =
  | { kind: 'identifier'; id: string }
  | { kind: 'text'; text: string }
  | { kind: 'structural'; classNameContains?: string; clickable?: boolean; enabled?: boolean }
  | { kind: 'bounds'; bounds: Bounds; clickable?: boolean };
