/**
 * Flow, notification and evidence types
 */

export enum FlowStep {
  Idle = 0,
  AwaitingShareDialog = 1,
  AwaitingChooser = 2,
  AwaitingShareConfirm = 3
}

export type ChangeKind = 'window-state-changed' | 'content-changed' | 'click' | 'focus';

export const CHANGE_KINDS: readonly ChangeKind[] = [
  'window-state-changed',
  'content-changed',
  'click',
  'focus'
];

export interface ChangeNotification {
  sourceApplicationId: string;
  kind: ChangeKind;
  /** Device event time in ms, when the source reports one */
  eventTime?: number;
}

export type TargetRole =
  | 'accept-button'
  | 'dismiss-button'
  | 'mode-spinner'
  | 'entire-screen-option'
  | 'confirm-button';

export type DialogShape = 'incoming-connection' | 'share-dialog' | 'share-chooser' | 'share-confirm';

export interface EvidenceSignal {
  name: string;
  weight: number;
  /** What matched, e.g. the caption or id that fired */
  detail?: string;
}

export interface EvidenceReport {
  shape: DialogShape;
  score: number;
  threshold: number;
  confirmed: boolean;
  signals: EvidenceSignal[];
  missingRequired: string[];
}

export type ApplicationRole = 'source' | 'companion';

export type CycleStatus =
  | 'busy'
  | 'no-window'
  | 'skipped'
  | 'no-dialog'
  | 'target-not-found'
  | 'action-failed'
  | 'advanced'
  | 'completed'
  | 'fault';

export interface ReprocessRequest {
  delayMs: number;
  /** Only run the follow-up cycle while the flow is still at this step */
  onlyIfStep?: FlowStep;
}

export interface CycleOutcome {
  traceId: string;
  application: ApplicationRole;
  status: CycleStatus;
  step: FlowStep;
  stuckReset: boolean;
  reprocess?: ReprocessRequest;
  detail?: string;
}

export interface FlowStatus {
  serviceEnabled: boolean;
  step: FlowStep;
  stepName: string;
  /** Identifier of the flow run in progress; null while Idle */
  flowId: string | null;
  dialogsDetected: number;
  autoAcceptCount: number;
  completedFlows: number;
  stuckResets: number;
  screenShareProcessed: boolean;
  processing: boolean;
  lastActivityTime: number;
}
