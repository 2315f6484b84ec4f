/**
 * Action Executor
 *
 * Clicks a node, escalating through accessibility-focus-then-click, long-click,
 * an input-focus-then-click and finally a click on the direct parent when the node
 * does not respond. Never throws: platform failures count as an unsuccessful
 * attempt and the next step of the ladder is tried.
 */

import type { TimingConfig } from '../../config/environment';
import type { NodeAction, UiNode } from '../../types/uiTree';
import { createServiceLogger, toError } from '../logger';
import type { Snapshot } from '../node-access/snapshot';

const log = createServiceLogger('action-executor');

export type ClickAttempt = 'click' | 'focus-click' | 'long-click' | 'refocus-click' | 'parent-click';

export interface ClickOptions {
  /** Try the long-click, refocus and parent steps after the basic ones */
  escalate?: boolean;
  traceId?: string;
}

export interface ClickResult {
  success: boolean;
  /** Attempt that succeeded, when one did */
  via?: ClickAttempt;
  attempts: ClickAttempt[];
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class ActionExecutor {
  constructor(
    private readonly timing: Pick<TimingConfig, 'focusSettleMs' | 'alternateFocusSettleMs'>,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async click(snapshot: Snapshot, node: UiNode, options: ClickOptions = {}): Promise<ClickResult> {
    const attempts: ClickAttempt[] = [];
    const { traceId } = options;

    const attempt = async (name: ClickAttempt, run: () => Promise<boolean>): Promise<boolean> => {
      attempts.push(name);
      const ok = await run();
      log.debug('click_attempt', `${name} ${ok ? 'succeeded' : 'failed'}`, traceId, { attempt: name, ok });
      return ok;
    };

    const done = (via: ClickAttempt): ClickResult => ({ success: true, via, attempts });

    if (await attempt('click', () => this.perform(snapshot, node, 'click', traceId))) {
      return done('click');
    }

    if (await attempt('focus-click', () => this.focusThenClick(snapshot, node, 'accessibility-focus', this.timing.focusSettleMs, traceId))) {
      return done('focus-click');
    }

    if (!options.escalate) {
      return { success: false, attempts };
    }

    if (await attempt('long-click', () => this.perform(snapshot, node, 'long-click', traceId))) {
      return done('long-click');
    }

    if (
      await attempt('refocus-click', () =>
        this.focusThenClick(snapshot, node, 'focus', this.timing.alternateFocusSettleMs, traceId)
      )
    ) {
      return done('refocus-click');
    }

    const parent = this.parentOf(snapshot, node, traceId);
    if (parent) {
      try {
        if (parent.clickable) {
          const parentResult = await this.click(snapshot, parent, { escalate: false, traceId });
          attempts.push('parent-click');
          if (parentResult.success) {
            return done('parent-click');
          }
        }
      } finally {
        snapshot.release(parent);
      }
    }

    log.warn('click_exhausted', 'Every click attempt failed', traceId, { attempts });
    return { success: false, attempts };
  }

  private async focusThenClick(
    snapshot: Snapshot,
    node: UiNode,
    focus: Extract<NodeAction, 'accessibility-focus' | 'focus'>,
    settleMs: number,
    traceId?: string
  ): Promise<boolean> {
    await this.perform(snapshot, node, focus, traceId);
    await this.sleep(settleMs);
    return this.perform(snapshot, node, 'click', traceId);
  }

  private async perform(snapshot: Snapshot, node: UiNode, action: NodeAction, traceId?: string): Promise<boolean> {
    try {
      return await snapshot.perform(node, action);
    } catch (error) {
      log.warn('action_error', `${action} raised an error`, traceId, { action, error: toError(error).message });
      return false;
    }
  }

  private parentOf(snapshot: Snapshot, node: UiNode, traceId?: string): UiNode | null {
    try {
      return snapshot.parentOf(node);
    } catch (error) {
      log.warn('parent_lookup_failed', 'Cannot resolve parent for escalation', traceId, {
        error: toError(error).message
      });
      return null;
    }
  }
}
