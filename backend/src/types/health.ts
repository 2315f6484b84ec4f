import type { FlowStatus } from './flow';

export interface HealthResponse {
  status: 'ok' | 'disabled';
  uptimeMs: number;
  timestamp: string;
  processing: boolean;
}

export interface StatusResponse extends FlowStatus {
  lastActivityAt: string;
}
