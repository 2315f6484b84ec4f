/**
 * Error taxonomy for the automation core.
 *
 * Target-not-found and action failures are ordinary cycle outcomes and are
 * not represented here; these classes cover faults raised by the platform,
 * the snapshot scope and configuration loading.
 */

export class AutomationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AutomationError';
  }
}

/** A node handle was read or used after it was released. */
export class StaleNodeError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STALE_NODE', details);
    this.name = 'StaleNodeError';
  }
}

/** A handle issued by another platform instance was passed in. */
export class ForeignHandleError extends AutomationError {
  constructor(message: string) {
    super(message, 'FOREIGN_HANDLE');
    this.name = 'ForeignHandleError';
  }
}

export class SnapshotInUseError extends AutomationError {
  constructor() {
    super('A snapshot is already live; release it before acquiring another', 'SNAPSHOT_IN_USE');
    this.name = 'SnapshotInUseError';
  }
}

export class UiDumpError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UI_DUMP_ERROR', details);
    this.name = 'UiDumpError';
  }
}

export class ConfigValidationError extends AutomationError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message, 'CONFIG_INVALID', { issues });
    this.name = 'ConfigValidationError';
  }
}
