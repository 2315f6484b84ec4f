/**
 * Flow State Machine
 *
 * One processing cycle: claim the single-flight slot, recover a stuck flow,
 * wait for the window to settle, then take a snapshot and act on whatever
 * dialog the current step expects. Every transition is guarded by evidence
 * confirmed on that same snapshot.
 */

import type { TimingConfig } from '../../config/environment';
import type { FlowState } from '../../state/flowState';
import { stepName } from '../../state/flowState';
import {
  FlowStep,
  type ApplicationRole,
  type CycleOutcome,
  type CycleStatus,
  type DialogShape,
  type ReprocessRequest,
  type TargetRole
} from '../../types/flow';
import type { DialogDetector } from '../detector/dialogDetector';
import type { ActionExecutor, Sleep } from '../executor/actionExecutor';
import type { NodeLocator } from '../locator/nodeLocator';
import { createServiceLogger, toError } from '../logger';
import type { NodeAccessLayer, Snapshot } from '../node-access/snapshot';
import type { NotificationSink } from '../notifications/notificationSink';

const log = createServiceLogger('flow-machine');

export const CONNECTION_ACCEPTED_MESSAGE = 'Connection accepted';
export const SCREEN_SHARING_STARTED_MESSAGE = 'Screen sharing started';

export interface FlowMachineDependencies {
  access: NodeAccessLayer;
  locator: NodeLocator;
  detector: DialogDetector;
  executor: ActionExecutor;
  notifier: NotificationSink;
  timing: TimingConfig;
  sleep?: Sleep;
}

interface StepResult {
  status: CycleStatus;
  reprocess?: ReprocessRequest;
  detail?: string;
}

type ActFailure = { ok: false; status: 'target-not-found' | 'action-failed' | 'skipped'; detail: string };
type ActResult = { ok: true } | ActFailure;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class FlowStateMachine {
  private readonly sleep: Sleep;
  /** Held across connections: a cycle on a torn-down state still owns the snapshot */
  private active = false;

  constructor(private readonly deps: FlowMachineDependencies) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get busy(): boolean {
    return this.active;
  }

  async runCycle(state: FlowState, application: ApplicationRole, traceId: string = log.generateTraceId()): Promise<CycleOutcome> {
    const finish = (result: StepResult, stuckReset: boolean): CycleOutcome => ({
      traceId,
      application,
      step: state.step,
      stuckReset,
      ...result
    });

    if (!state.isEnabled) {
      return finish({ status: 'skipped', detail: 'service disabled' }, false);
    }
    if (this.active || !state.tryBeginCycle()) {
      log.debug('cycle_dropped', 'Cycle already in flight', traceId, { application });
      return finish({ status: 'busy' }, false);
    }
    this.active = true;

    const timer = log.startTimer('cycle', traceId, { application });
    let stuckReset = false;
    try {
      stuckReset = state.checkStuck(this.deps.timing.stuckTimeoutMs);

      if (application === 'source' && state.step !== FlowStep.Idle) {
        return finish({ status: 'skipped', detail: `source windows ignored at ${stepName(state.step)}` }, stuckReset);
      }
      if (application === 'companion' && state.step === FlowStep.Idle) {
        return finish({ status: 'skipped', detail: 'companion windows ignored while Idle' }, stuckReset);
      }

      await this.sleep(application === 'source' ? this.deps.timing.sourceSettleMs : this.deps.timing.companionSettleMs);
      if (!state.isEnabled) {
        return finish({ status: 'skipped', detail: 'service disabled during settle' }, stuckReset);
      }

      const result = await this.deps.access.withSnapshot(snapshot => {
        if (!state.isEnabled) {
          return Promise.resolve<StepResult>({ status: 'skipped', detail: 'service disabled during capture' });
        }
        return application === 'source'
          ? this.handleSource(snapshot, state, traceId)
          : this.handleCompanion(snapshot, state, traceId);
      });

      const outcome = finish(result ?? { status: 'no-window' }, stuckReset);
      log.info('cycle_complete', `${application} cycle: ${outcome.status}`, traceId, {
        application,
        status: outcome.status,
        step: stepName(outcome.step),
        stuckReset,
        reprocessMs: outcome.reprocess?.delayMs
      });
      return outcome;
    } catch (error) {
      const err = toError(error);
      log.error('cycle_fault', 'Processing cycle failed', err, traceId, { application, step: stepName(state.step) });
      return finish({ status: 'fault', detail: err.message }, stuckReset);
    } finally {
      state.endCycle();
      this.active = false;
      timer.end();
    }
  }

  private async handleSource(snapshot: Snapshot, state: FlowState, traceId: string): Promise<StepResult> {
    if (!this.confirmed(snapshot, 'incoming-connection', traceId)) {
      return { status: 'no-dialog' };
    }
    state.recordDialogDetected();

    const acted = await this.act(snapshot, state, 'accept-button', traceId);
    if (!acted.ok) {
      return acted;
    }

    state.recordAutoAccept();
    state.advance(FlowStep.AwaitingShareDialog);
    await this.notify(CONNECTION_ACCEPTED_MESSAGE, traceId);
    return { status: 'advanced' };
  }

  private async handleCompanion(snapshot: Snapshot, state: FlowState, traceId: string): Promise<StepResult> {
    const { timing } = this.deps;

    switch (state.step) {
      case FlowStep.Idle:
        return { status: 'skipped' };

      case FlowStep.AwaitingShareDialog: {
        let spinnerFailure: ActFailure | null = null;
        if (this.confirmed(snapshot, 'share-dialog', traceId)) {
          const acted = await this.act(snapshot, state, 'mode-spinner', traceId);
          if (acted.ok) {
            state.advance(FlowStep.AwaitingChooser);
            return { status: 'advanced' };
          }
          spinnerFailure = acted;
        }
        // Chooser already open, whether or not the spinner click registered
        if (state.isEnabled && this.confirmed(snapshot, 'share-chooser', traceId)) {
          state.advance(FlowStep.AwaitingChooser);
          return {
            status: 'advanced',
            detail: 'chooser already open',
            reprocess: { delayMs: timing.fallbackReprocessMs, onlyIfStep: FlowStep.AwaitingChooser }
          };
        }
        return spinnerFailure ?? { status: 'no-dialog' };
      }

      case FlowStep.AwaitingChooser: {
        if (this.confirmed(snapshot, 'share-chooser', traceId)) {
          const acted = await this.act(snapshot, state, 'entire-screen-option', traceId);
          if (!acted.ok) return acted;
          state.advance(FlowStep.AwaitingShareConfirm);
          return {
            status: 'advanced',
            reprocess: { delayMs: timing.chooserReprocessMs, onlyIfStep: FlowStep.AwaitingShareConfirm }
          };
        }
        if (this.confirmed(snapshot, 'share-confirm', traceId)) {
          state.advance(FlowStep.AwaitingShareConfirm);
          return {
            status: 'advanced',
            detail: 'entire screen already selected',
            reprocess: { delayMs: timing.fallbackReprocessMs, onlyIfStep: FlowStep.AwaitingShareConfirm }
          };
        }
        return { status: 'no-dialog' };
      }

      case FlowStep.AwaitingShareConfirm: {
        const retry: ReprocessRequest = { delayMs: timing.confirmRetryMs, onlyIfStep: FlowStep.AwaitingShareConfirm };
        if (!this.confirmed(snapshot, 'share-confirm', traceId)) {
          return { status: 'no-dialog', reprocess: retry };
        }
        const acted = await this.act(snapshot, state, 'confirm-button', traceId);
        if (!acted.ok) {
          return { ...acted, reprocess: retry };
        }
        state.completeFlow();
        await this.notify(SCREEN_SHARING_STARTED_MESSAGE, traceId);
        return { status: 'completed' };
      }
    }
  }

  private confirmed(snapshot: Snapshot, shape: DialogShape, traceId: string): boolean {
    return this.deps.detector.classify(snapshot, shape, traceId).confirmed;
  }

  /**
   * Locate `role` and click it, releasing the target afterwards
   */
  private async act(snapshot: Snapshot, state: FlowState, role: TargetRole, traceId: string): Promise<ActResult> {
    if (!state.isEnabled) {
      return { ok: false, status: 'skipped', detail: `${role}: service disabled` };
    }
    const target = this.deps.locator.locate(snapshot, role, traceId);
    if (!target) {
      return { ok: false, status: 'target-not-found', detail: role };
    }

    try {
      const result = await this.deps.executor.click(snapshot, target.node, { escalate: target.escalate, traceId });
      if (!result.success) {
        return { ok: false, status: 'action-failed', detail: `${role}: ${result.attempts.join(', ')}` };
      }
      log.info('target_clicked', `${role} clicked via ${result.via ?? 'click'}`, traceId, {
        role,
        strategy: target.strategy,
        caption: target.caption
      });
      return { ok: true };
    } finally {
      snapshot.release(target.node);
    }
  }

  private async notify(message: string, traceId: string): Promise<void> {
    try {
      await this.deps.notifier.notify({ message, traceId });
    } catch (error) {
      log.warn('notify_failed', `Could not deliver "${message}"`, traceId, { error: toError(error).message });
    }
  }
}
