/**
 * Auto-accept service
 *
 * Entry point the host drives: `connect` when the notification source is
 * bound, `onChange` for every UI change notification, and one of
 * `interrupt`/`unbind`/`destroy` when it goes away. Wires the event gate,
 * the flow state machine and the per-connection {@link FlowState}.
 */

import { EventEmitter } from 'events';
import type { AppConfig } from '../config/environment';
import type { UiVariants } from '../config/uiVariants';
import { FlowState, type Clock } from '../state/flowState';
import type { ApplicationRole, ChangeNotification, CycleOutcome, FlowStatus } from '../types/flow';
import { DialogDetector } from './detector/dialogDetector';
import { ActionExecutor, type Sleep } from './executor/actionExecutor';
import { FlowStateMachine } from './flow/flowStateMachine';
import { NodeLocator } from './locator/nodeLocator';
import { createServiceLogger } from './logger';
import { NodeAccessLayer } from './node-access/snapshot';
import { LogNotificationSink, type NotificationSink } from './notifications/notificationSink';
import type { UiPlatform } from './platform/uiPlatform';
import { DeferredTaskScheduler } from './scheduler/deferredTasks';
import { EventGate, type GateDecision } from './scheduler/eventGate';

const log = createServiceLogger('auto-accept');

export type TeardownReason = 'interrupt' | 'unbind' | 'destroy';

export interface AutoAcceptServiceOptions {
  config: Pick<AppConfig, 'applications' | 'triggerKinds' | 'timing'>;
  platform: UiPlatform;
  variants: UiVariants;
  notifier?: NotificationSink;
  /** Clock shared by the gate and the flow state */
  clock?: Clock;
  sleep?: Sleep;
}

export class AutoAcceptService extends EventEmitter {
  private state: FlowState;
  private readonly clock: Clock;
  private readonly scheduler = new DeferredTaskScheduler();
  private readonly machine: FlowStateMachine;
  private readonly gate: EventGate;
  private readonly config: AutoAcceptServiceOptions['config'];

  constructor(options: AutoAcceptServiceOptions) {
    super();
    this.config = options.config;
    this.clock = options.clock ?? Date.now;

    const locator = new NodeLocator(options.variants.roles);
    this.machine = new FlowStateMachine({
      access: new NodeAccessLayer(options.platform),
      locator,
      detector: new DialogDetector(options.variants.shapes, locator),
      executor: new ActionExecutor(options.config.timing, options.sleep),
      notifier: options.notifier ?? new LogNotificationSink(),
      timing: options.config.timing,
      sleep: options.sleep
    });

    this.gate = new EventGate(
      {
        applications: options.config.applications,
        triggerKinds: options.config.triggerKinds,
        timing: options.config.timing,
        clock: this.clock
      },
      this.scheduler,
      {
        isEnabled: () => this.state.isEnabled,
        currentStep: () => this.state.step,
        runCycle: application => this.runCycle(application)
      }
    );

    // Disabled until connect()
    this.state = new FlowState(this.clock);
    this.state.teardown();
  }

  get enabled(): boolean {
    return this.state.isEnabled;
  }

  /**
   * Start a fresh connection. Counters and step start from zero. A cycle
   * still running against the previous connection stops before acting, and
   * new cycles report `busy` until it has released the snapshot.
   */
  connect(): void {
    this.scheduler.cancelAll();
    this.gate.reset();
    this.state = new FlowState(this.clock);
    log.info('service_connected', 'Auto-accept service connected', undefined, {
      sourcePackage: this.config.applications.sourcePackage,
      companionPackage: this.config.applications.companionPackage,
      triggerKinds: this.config.triggerKinds
    });
    this.emit('connected');
  }

  onChange(notification: ChangeNotification): GateDecision {
    return this.gate.onChange(notification);
  }

  async runCycle(application: ApplicationRole): Promise<CycleOutcome> {
    const outcome = await this.machine.runCycle(this.state, application);
    this.emit('cycle', outcome);
    if (outcome.status === 'completed') {
      this.emit('flow-completed', this.state.status());
    }
    return outcome;
  }

  interrupt(): void {
    this.teardown('interrupt');
  }

  unbind(): void {
    this.teardown('unbind');
  }

  destroy(): void {
    this.teardown('destroy');
  }

  status(): FlowStatus {
    return { ...this.state.status(), processing: this.machine.busy };
  }

  private teardown(reason: TeardownReason): void {
    this.scheduler.cancelAll();
    const final = this.state.status();
    this.state.teardown();
    log.info('service_teardown', `Auto-accept service stopped (${reason})`, undefined, {
      reason,
      dialogsDetected: final.dialogsDetected,
      autoAcceptCount: final.autoAcceptCount,
      completedFlows: final.completedFlows,
      stuckResets: final.stuckResets
    });
    this.emit('teardown', reason);
  }
}
