/**
 * Node Locator
 *
 * Resolves a target role to one node by trying the role's strategies in
 * order: identifier (optionally caption-checked), text with walk-up to the
 * nearest interactive ancestor, structural match, and absolute bounds.
 * Every handle the locator touches is released except the one it returns.
 */

import type { LocatorStrategy, RoleDefinition, UiVariants } from '../../config/uiVariants';
import type { TargetRole } from '../../types/flow';
import type { UiNode } from '../../types/uiTree';
import { createServiceLogger } from '../logger';
import { isInteractive } from '../node-access/matchers';
import type { Snapshot } from '../node-access/snapshot';

const log = createServiceLogger('node-locator');

export interface LocatedTarget {
  role: TargetRole;
  node: UiNode;
  strategy: LocatorStrategy['kind'];
  caption: string | null;
  escalate: boolean;
}

const normalise = (value: string): string => value.trim().toLowerCase();

const nonEmpty = (value: string | null): string | null =>
  value !== null && value.trim().length > 0 ? value.trim() : null;

/**
 * Visible caption of a node: its own text, or else the text of its first
 * direct child that has any.
 */
export function captionOf(snapshot: Snapshot, node: UiNode): string | null {
  const own = nonEmpty(node.text);
  if (own) {
    return own;
  }

  for (let index = 0; index < node.childCount; index++) {
    const child = snapshot.childAt(node, index);
    if (!child) continue;
    const text = nonEmpty(child.text);
    snapshot.release(child);
    if (text) {
      return text;
    }
  }
  return null;
}

export const captionMatches = (caption: string | null, expected: string, match: 'equals' | 'contains'): boolean => {
  if (caption === null) return false;
  return match === 'equals'
    ? normalise(caption) === normalise(expected)
    : normalise(caption).includes(normalise(expected));
};

const isRejected = (caption: string | null, rejectCaptions: string[] | undefined): boolean =>
  caption !== null && (rejectCaptions ?? []).some(rejected => normalise(rejected) === normalise(caption));

export class NodeLocator {
  constructor(private readonly roles: UiVariants['roles']) {}

  definition(role: TargetRole): RoleDefinition {
    return this.roles[role];
  }

  /**
   * First node satisfying one of the role's strategies, or null. The caller
   * owns the returned node.
   */
  locate(snapshot: Snapshot, role: TargetRole, traceId?: string): LocatedTarget | null {
    const definition = this.roles[role];

    for (const strategy of definition.strategies) {
      const found = this.applyStrategy(snapshot, strategy);
      if (found) {
        log.debug('target_located', `${role} located by ${strategy.kind}`, traceId, {
          role,
          strategy: strategy.kind,
          caption: found.caption
        });
        return { role, strategy: strategy.kind, escalate: definition.escalate, ...found };
      }
    }

    log.debug('target_not_found', `${role} not located`, traceId, {
      role,
      strategies: definition.strategies.map(strategy => strategy.kind)
    });
    return null;
  }

  private applyStrategy(
    snapshot: Snapshot,
    strategy: LocatorStrategy
  ): { node: UiNode; caption: string | null } | null {
    switch (strategy.kind) {
      case 'identifier': {
        const { captions, rejectCaptions } = strategy;
        const candidates = snapshot.query({ kind: 'identifier', id: strategy.id });
        return this.pickFirst(snapshot, candidates.filter(node => this.keepInteractive(snapshot, node)), caption => {
          if (isRejected(caption, rejectCaptions)) return false;
          if (!captions) return true;
          return captions.some(expected => captionMatches(caption, expected, 'equals'));
        });
      }

      case 'text':
        return this.locateByText(snapshot, strategy);

      case 'structural': {
        const { rejectCaptions } = strategy;
        return this.pickFirst(
          snapshot,
          snapshot.query({
            kind: 'structural',
            classNameContains: strategy.classNameContains,
            clickable: strategy.clickable,
            enabled: strategy.enabled
          }),
          caption => !isRejected(caption, rejectCaptions)
        );
      }

      case 'bounds': {
        const { rejectCaptions } = strategy;
        return this.pickFirst(
          snapshot,
          snapshot.query({ kind: 'bounds', bounds: strategy.bounds, clickable: strategy.clickable }),
          caption => !isRejected(caption, rejectCaptions)
        );
      }
    }
  }

  /** Release `node` unless it is clickable and enabled */
  private keepInteractive(snapshot: Snapshot, node: UiNode): boolean {
    if (isInteractive(node)) return true;
    snapshot.release(node);
    return false;
  }

  /**
   * Keep the first candidate whose caption passes `accept`, release the rest
   */
  private pickFirst(
    snapshot: Snapshot,
    candidates: UiNode[],
    accept: (caption: string | null) => boolean
  ): { node: UiNode; caption: string | null } | null {
    let picked: { node: UiNode; caption: string | null } | null = null;

    for (const candidate of candidates) {
      if (picked) {
        snapshot.release(candidate);
        continue;
      }
      const caption = captionOf(snapshot, candidate);
      if (accept(caption)) {
        picked = { node: candidate, caption };
      } else {
        snapshot.release(candidate);
      }
    }
    return picked;
  }

  private locateByText(
    snapshot: Snapshot,
    strategy: Extract<LocatorStrategy, { kind: 'text' }>
  ): { node: UiNode; caption: string | null } | null {
    const candidates = snapshot.query({ kind: 'text', text: strategy.text });
    let picked: { node: UiNode; caption: string | null } | null = null;

    for (const candidate of candidates) {
      if (picked) {
        snapshot.release(candidate);
        continue;
      }

      const matchedCaption = captionOf(snapshot, candidate) ?? nonEmpty(candidate.contentDescription);
      if (!captionMatches(matchedCaption, strategy.text, strategy.match)) {
        snapshot.release(candidate);
        continue;
      }

      const target = strategy.walkUp ? this.nearestInteractive(snapshot, candidate) : candidate;
      if (!target) {
        continue;
      }

      const classOk =
        strategy.classNameContains === undefined || (target.className ?? '').includes(strategy.classNameContains);
      const caption = target === candidate ? matchedCaption : captionOf(snapshot, target);

      if (classOk && !isRejected(caption, strategy.rejectCaptions)) {
        picked = { node: target, caption };
      } else {
        snapshot.release(target);
      }
    }
    return picked;
  }

  /**
   * Walk from `node` towards the root until a clickable, enabled node is
   * reached. Every handle passed on the way is released; null when no
   * ancestor qualifies.
   */
  private nearestInteractive(snapshot: Snapshot, node: UiNode): UiNode | null {
    let current: UiNode | null = node;
    while (current && !isInteractive(current)) {
      const parent = snapshot.parentOf(current);
      snapshot.release(current);
      current = parent;
    }
    return current;
  }
}
