/**
 * Tree-backed platform
 *
 * Implements {@link UiPlatform} over a parsed UI tree. Each query issues
 * new {@link TreeNodeHandle} objects and the platform keeps count of how
 * many are still outstanding, so handle leaks are observable.
 */

import type { Bounds, NodeAction, UiNode, UiTreeNode } from '../../types/uiTree';
import { ForeignHandleError, StaleNodeError } from '../../utils/errors';
import type { HandleStats, UiPlatform } from './uiPlatform';

/** Supplies the current window tree */
export type TreeSource = () => Promise<UiTreeNode | null>;

/** Performs an action against the element behind a handle */
export interface ActionDriver {
  perform(node: UiTreeNode, action: NodeAction): Promise<boolean>;
}

export class TreeNodeHandle implements UiNode {
  private recycled = false;

  constructor(
    private readonly node: UiTreeNode,
    readonly owner: TreeUiPlatform,
    readonly serial: number
  ) {}

  /** Underlying element; throws once the handle was released */
  get element(): UiTreeNode {
    if (this.recycled) {
      throw new StaleNodeError(`Node handle #${this.serial} used after release`, { serial: this.serial });
    }
    return this.node;
  }

  get isRecycled(): boolean {
    return this.recycled;
  }

  markRecycled(): void {
    if (this.recycled) {
      throw new StaleNodeError(`Node handle #${this.serial} released twice`, { serial: this.serial });
    }
    this.recycled = true;
  }

  get className(): string | null {
    return this.element.className;
  }

  get text(): string | null {
    return this.element.text;
  }

  get contentDescription(): string | null {
    return this.element.contentDescription;
  }

  get viewId(): string | null {
    return this.element.resourceId;
  }

  get clickable(): boolean {
    return this.element.clickable;
  }

  get enabled(): boolean {
    return this.element.enabled;
  }

  get visible(): boolean {
    return this.element.visible;
  }

  get bounds(): Bounds {
    return { ...this.element.bounds };
  }

  get childCount(): number {
    return this.element.children.length;
  }
}

const containsIgnoringCase = (value: string | null, needle: string): boolean =>
  value !== null && value.toLowerCase().includes(needle);

export class TreeUiPlatform implements UiPlatform {
  private issued = 0;
  private recycledCount = 0;

  constructor(
    private readonly source: TreeSource,
    private readonly driver: ActionDriver
  ) {}

  async rootInActiveWindow(): Promise<UiNode | null> {
    const root = await this.source();
    return root ? this.issue(root) : null;
  }

  findByViewId(node: UiNode, viewId: string): UiNode[] {
    const matches: UiNode[] = [];
    const visit = (element: UiTreeNode): void => {
      if (element.resourceId === viewId) {
        matches.push(this.issue(element));
      }
      element.children.forEach(visit);
    };
    visit(this.unwrap(node));
    return matches;
  }

  findByText(node: UiNode, text: string): UiNode[] {
    const needle = text.toLowerCase();
    const matches: UiNode[] = [];
    const visit = (element: UiTreeNode): void => {
      if (containsIgnoringCase(element.text, needle) || containsIgnoringCase(element.contentDescription, needle)) {
        matches.push(this.issue(element));
      }
      element.children.forEach(visit);
    };
    visit(this.unwrap(node));
    return matches;
  }

  getChild(node: UiNode, index: number): UiNode | null {
    const child = this.unwrap(node).children[index];
    return child ? this.issue(child) : null;
  }

  getParent(node: UiNode): UiNode | null {
    const parent = this.unwrap(node).parent;
    return parent ? this.issue(parent) : null;
  }

  async performAction(node: UiNode, action: NodeAction): Promise<boolean> {
    return this.driver.perform(this.unwrap(node), action);
  }

  recycle(node: UiNode): void {
    this.ownHandle(node).markRecycled();
    this.recycledCount++;
  }

  stats(): HandleStats {
    return {
      issued: this.issued,
      recycled: this.recycledCount,
      outstanding: this.issued - this.recycledCount
    };
  }

  private issue(element: UiTreeNode): TreeNodeHandle {
    this.issued++;
    return new TreeNodeHandle(element, this, this.issued);
  }

  private ownHandle(node: UiNode): TreeNodeHandle {
    if (!(node instanceof TreeNodeHandle) || node.owner !== this) {
      throw new ForeignHandleError('Handle was not issued by this platform');
    }
    return node;
  }

  private unwrap(node: UiNode): UiTreeNode {
    return this.ownHandle(node).element;
  }
}
