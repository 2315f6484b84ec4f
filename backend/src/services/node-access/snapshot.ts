/**
 * Node Access Layer
 *
 * A {@link Snapshot} is the scope every handle of a processing cycle lives
 * in. Handles obtained through it are tracked in a ledger; `release` is
 * idempotent and `close` releases whatever is still outstanding, the root
 * included. Only one snapshot may be live per access layer.
 */

import type { MatchCriteria, NodeAction, UiNode } from '../../types/uiTree';
import { SnapshotInUseError, StaleNodeError } from '../../utils/errors';
import { createServiceLogger, toError } from '../logger';
import type { UiPlatform } from '../platform/uiPlatform';
import { matchesCriteria } from './matchers';

const log = createServiceLogger('node-access');

export interface QueryOptions {
  /** Stop at the first match and release the rest */
  first?: boolean;
}

export class Snapshot {
  private readonly ledger = new Set<UiNode>();
  private closed = false;

  constructor(
    private readonly platform: UiPlatform,
    readonly root: UiNode,
    private readonly onClose: () => void = () => undefined
  ) {
    this.ledger.add(root);
  }

  /** Handles obtained through this snapshot and not yet released */
  get outstanding(): number {
    return this.ledger.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  owns(node: UiNode): boolean {
    return this.ledger.has(node);
  }

  /**
   * Nodes under the root matching `criteria`, in document order for
   * identifier and text queries and breadth-first order otherwise.
   */
  query(criteria: MatchCriteria, options: QueryOptions = {}): UiNode[] {
    this.assertOpen();

    switch (criteria.kind) {
      case 'identifier':
        return this.keep(this.platform.findByViewId(this.root, criteria.id), options);
      case 'text':
        return this.keep(this.platform.findByText(this.root, criteria.text), options);
      case 'structural':
      case 'bounds':
        return this.breadthFirst(criteria, options);
    }
  }

  queryFirst(criteria: MatchCriteria): UiNode | null {
    return this.query(criteria, { first: true })[0] ?? null;
  }

  parentOf(node: UiNode): UiNode | null {
    this.assertOpen();
    return this.track(this.platform.getParent(node));
  }

  childAt(node: UiNode, index: number): UiNode | null {
    this.assertOpen();
    return this.track(this.platform.getChild(node, index));
  }

  perform(node: UiNode, action: NodeAction): Promise<boolean> {
    this.assertOpen();
    return this.platform.performAction(node, action);
  }

  release(node: UiNode | null | undefined): void {
    if (!node || !this.ledger.delete(node)) {
      return;
    }
    try {
      this.platform.recycle(node);
    } catch (error) {
      log.debug('release_failed', 'Platform rejected handle release', undefined, {
        error: toError(error).message
      });
    }
  }

  releaseAll(nodes: Iterable<UiNode>): void {
    for (const node of nodes) {
      this.release(node);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.releaseAll([...this.ledger]);
    this.closed = true;
    this.onClose();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StaleNodeError('Snapshot used after close');
    }
  }

  private track(node: UiNode | null): UiNode | null {
    if (node) {
      this.ledger.add(node);
    }
    return node;
  }

  private keep(nodes: UiNode[], { first }: QueryOptions): UiNode[] {
    nodes.forEach(node => this.ledger.add(node));
    if (first && nodes.length > 1) {
      this.releaseAll(nodes.slice(1));
      return nodes.slice(0, 1);
    }
    return nodes;
  }

  private breadthFirst(criteria: MatchCriteria, { first }: QueryOptions): UiNode[] {
    const matches: UiNode[] = [];
    const queue: UiNode[] = [this.root];

    while (queue.length > 0) {
      const node = queue.shift();
      if (!node) break;

      if (node !== this.root && matchesCriteria(node, criteria)) {
        matches.push(node);
        if (first) {
          this.releaseAll(queue);
          return matches;
        }
      }

      for (let index = 0; index < node.childCount; index++) {
        const child = this.childAt(node, index);
        if (child) queue.push(child);
      }

      if (node !== this.root && matches[matches.length - 1] !== node) {
        this.release(node);
      }
    }

    return matches;
  }
}

export class NodeAccessLayer {
  private live: Snapshot | 'acquiring' | null = null;

  constructor(private readonly platform: UiPlatform) {}

  get hasLiveSnapshot(): boolean {
    return this.live !== null;
  }

  /**
   * Snapshot of the active window, or null when there is none.
   *
   * @throws SnapshotInUseError while another snapshot is live
   */
  async acquireSnapshot(): Promise<Snapshot | null> {
    if (this.live !== null) {
      throw new SnapshotInUseError();
    }

    this.live = 'acquiring';
    let root: UiNode | null;
    try {
      root = await this.platform.rootInActiveWindow();
    } catch (error) {
      this.live = null;
      throw error;
    }

    if (!root) {
      this.live = null;
      return null;
    }

    const snapshot = new Snapshot(this.platform, root, () => {
      if (this.live === snapshot) {
        this.live = null;
      }
    });
    this.live = snapshot;
    return snapshot;
  }

  /**
   * Run `fn` inside a snapshot that is closed however `fn` exits.
   * Resolves to null when there is no active window.
   */
  async withSnapshot<T>(fn: (snapshot: Snapshot) => Promise<T>): Promise<T | null> {
    const snapshot = await this.acquireSnapshot();
    if (!snapshot) {
      return null;
    }
    try {
      return await fn(snapshot);
    } finally {
      snapshot.close();
    }
  }
}
