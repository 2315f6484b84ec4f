import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger';
import { FlowStep, type FlowStatus } from '../types/flow';

export type Clock = () => number;

const STEP_NAMES: Record<FlowStep, string> = {
  [FlowStep.Idle]: 'Idle',
  [FlowStep.AwaitingShareDialog]: 'AwaitingShareDialog',
  [FlowStep.AwaitingChooser]: 'AwaitingChooser',
  [FlowStep.AwaitingShareConfirm]: 'AwaitingShareConfirm'
};

export const stepName = (step: FlowStep): string => STEP_NAMES[step];

/**
 * Mutable context of one service connection. `lastActivityTime` moves only
 * on forward progress, so a flow that keeps seeing unrelated windows still
 * times out.
 */
export class FlowState {
  private currentStep: FlowStep = FlowStep.Idle;
  private currentFlowId: string | null = null;
  private lastActivity: number;
  private inCycle = false;
  private enabled = true;

  private counters = {
    dialogsDetected: 0,
    autoAcceptCount: 0,
    completedFlows: 0,
    stuckResets: 0
  };

  private screenShareProcessed = false;

  constructor(private readonly clock: Clock = Date.now) {
    this.lastActivity = clock();
  }

  get step(): FlowStep {
    return this.currentStep;
  }

  get flowId(): string | null {
    return this.currentFlowId;
  }

  get lastActivityTime(): number {
    return this.lastActivity;
  }

  get processing(): boolean {
    return this.inCycle;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Claim the single processing slot. False while a cycle is running or
   * after teardown.
   */
  tryBeginCycle(): boolean {
    if (this.inCycle || !this.enabled) {
      return false;
    }
    this.inCycle = true;
    return true;
  }

  endCycle() {
    this.inCycle = false;
  }

  recordDialogDetected() {
    this.counters.dialogsDetected++;
  }

  recordAutoAccept() {
    this.counters.autoAcceptCount++;
  }

  advance(next: FlowStep) {
    if (this.currentStep === FlowStep.Idle && next !== FlowStep.Idle) {
      this.currentFlowId = uuidv4();
      this.screenShareProcessed = false;
    }
    logger.debug('Flow step advanced', { from: stepName(this.currentStep), to: stepName(next), flowId: this.currentFlowId });
    this.currentStep = next;
    this.lastActivity = this.clock();
  }

  completeFlow() {
    this.counters.completedFlows++;
    this.screenShareProcessed = true;
    this.currentStep = FlowStep.Idle;
    this.currentFlowId = null;
    this.lastActivity = this.clock();
  }

  resetToIdle() {
    this.currentStep = FlowStep.Idle;
    this.currentFlowId = null;
    this.lastActivity = this.clock();
  }

  /**
   * Force Idle when a flow has made no progress for `timeoutMs`. Returns
   * true when a reset happened.
   */
  checkStuck(timeoutMs: number, now: number = this.clock()): boolean {
    if (this.currentStep === FlowStep.Idle) {
      return false;
    }
    if (now - this.lastActivity <= timeoutMs) {
      return false;
    }
    logger.warn('Flow stuck, resetting to Idle', {
      step: stepName(this.currentStep),
      idleMs: now - this.lastActivity,
      flowId: this.currentFlowId
    });
    this.counters.stuckResets++;
    this.resetToIdle();
    return true;
  }

  /**
   * Stop accepting cycles and drop any flow in progress
   */
  teardown() {
    this.enabled = false;
    this.currentStep = FlowStep.Idle;
    this.currentFlowId = null;
    this.screenShareProcessed = false;
  }

  status(): FlowStatus {
    return {
      serviceEnabled: this.enabled,
      step: this.currentStep,
      stepName: stepName(this.currentStep),
      flowId: this.currentFlowId,
      ...this.counters,
      screenShareProcessed: this.screenShareProcessed,
      processing: this.inCycle,
      lastActivityTime: this.lastActivity
    };
  }
}
