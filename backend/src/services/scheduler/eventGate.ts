/**
 * Event Gate
 *
 * Filters change notifications down to the ones worth a processing cycle
 * and schedules that cycle after a settle delay. Accepted notifications are
 * rate limited; a newer notification replaces a pending settle delay and
 * cancels a pending retry. Follow-up cycles requested by an outcome run as
 * `retry` tasks.
 */

import type { ApplicationsConfig, TimingConfig } from '../../config/environment';
import type { ApplicationRole, ChangeKind, ChangeNotification, CycleOutcome, FlowStep, ReprocessRequest } from '../../types/flow';
import { createServiceLogger } from '../logger';
import type { DeferredTaskScheduler } from './deferredTasks';

const log = createServiceLogger('event-gate');

export type GateDecision = 'scheduled' | 'disabled' | 'foreign-application' | 'ignored-kind' | 'rate-limited';

export type CycleRunner = (application: ApplicationRole) => Promise<CycleOutcome>;

export interface EventGateOptions {
  applications: ApplicationsConfig;
  triggerKinds: readonly ChangeKind[];
  timing: Pick<TimingConfig, 'minProcessIntervalMs' | 'settleDelayMs'>;
  clock?: () => number;
}

export interface GateTarget {
  isEnabled(): boolean;
  currentStep(): FlowStep;
  runCycle: CycleRunner;
}

export class EventGate {
  private lastProcessTime = Number.NEGATIVE_INFINITY;
  private readonly clock: () => number;

  constructor(
    private readonly options: EventGateOptions,
    private readonly scheduler: DeferredTaskScheduler,
    private readonly target: GateTarget
  ) {
    this.clock = options.clock ?? Date.now;
  }

  applicationOf(packageName: string): ApplicationRole | null {
    const { sourcePackage, companionPackage } = this.options.applications;
    if (packageName === sourcePackage) return 'source';
    if (packageName === companionPackage) return 'companion';
    return null;
  }

  onChange(notification: ChangeNotification): GateDecision {
    if (!this.target.isEnabled()) {
      return 'disabled';
    }

    const application = this.applicationOf(notification.sourceApplicationId);
    if (!application) {
      return 'foreign-application';
    }

    if (!this.options.triggerKinds.includes(notification.kind)) {
      return 'ignored-kind';
    }

    const now = this.clock();
    if (now - this.lastProcessTime < this.options.timing.minProcessIntervalMs) {
      log.debug('notification_throttled', `Dropped ${notification.kind} from ${application}`, undefined, {
        sinceLastMs: now - this.lastProcessTime
      });
      return 'rate-limited';
    }
    this.lastProcessTime = now;

    this.scheduler.cancel('retry');
    this.scheduler.schedule('settle-delay', this.options.timing.settleDelayMs, () => this.dispatch(application));

    log.debug('cycle_scheduled', `${application} cycle in ${this.options.timing.settleDelayMs}ms`, undefined, {
      application,
      kind: notification.kind
    });
    return 'scheduled';
  }

  /** Forget the rate-limit window, e.g. after reconnecting */
  reset(): void {
    this.lastProcessTime = Number.NEGATIVE_INFINITY;
  }

  private async dispatch(application: ApplicationRole): Promise<void> {
    const outcome = await this.target.runCycle(application);
    if (outcome.reprocess && this.target.isEnabled()) {
      this.scheduleReprocess(application, outcome.reprocess);
    }
  }

  private scheduleReprocess(application: ApplicationRole, request: ReprocessRequest): void {
    this.scheduler.schedule('retry', request.delayMs, async () => {
      if (!this.target.isEnabled()) {
        return;
      }
      if (request.onlyIfStep !== undefined && this.target.currentStep() !== request.onlyIfStep) {
        log.debug('reprocess_skipped', 'Flow moved on before the follow-up cycle', undefined, {
          expectedStep: request.onlyIfStep,
          step: this.target.currentStep()
        });
        return;
      }
      await this.dispatch(application);
    });
  }
}
