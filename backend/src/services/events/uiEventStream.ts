/**
 * Device event stream
 *
 * Follows `uiautomator events` on the device and re-emits each accessibility
 * event as a {@link ChangeNotification}. The stream restarts itself when the
 * adb session ends until {@link UiEventStream.stop} is called.
 */

import type { ChildProcessWithoutNullStreams } from 'child_process';
import { EventEmitter } from 'events';
import { createInterface } from 'readline';
import type { ChangeKind, ChangeNotification } from '../../types/flow';
import type { AdbCli } from '../androidCli';
import { createServiceLogger } from '../logger';

const log = createServiceLogger('ui-event-stream');

const EVENT_TYPE_PATTERN = /EventType: (\w+)/;
const PACKAGE_PATTERN = /PackageName: ([\w.]+)/;
const EVENT_TIME_PATTERN = /EventTime: (\d+)/;

const EVENT_KINDS: Record<string, ChangeKind> = {
  TYPE_WINDOW_STATE_CHANGED: 'window-state-changed',
  TYPE_WINDOW_CONTENT_CHANGED: 'content-changed',
  TYPE_VIEW_CLICKED: 'click',
  TYPE_VIEW_FOCUSED: 'focus'
};

/**
 * Parse one line of `uiautomator events` output. Lines for event types the
 * automation does not use yield null.
 */
export function parseEventLine(line: string): ChangeNotification | null {
  const type = EVENT_TYPE_PATTERN.exec(line)?.[1];
  const packageName = PACKAGE_PATTERN.exec(line)?.[1];
  if (!type || !packageName) {
    return null;
  }

  const kind = EVENT_KINDS[type];
  if (!kind) {
    return null;
  }

  const eventTime = EVENT_TIME_PATTERN.exec(line)?.[1];
  return {
    sourceApplicationId: packageName,
    kind,
    ...(eventTime ? { eventTime: Number(eventTime) } : {})
  };
}

export class UiEventStream extends EventEmitter {
  private child: ChildProcessWithoutNullStreams | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private stopped = true;

  constructor(
    private readonly cli: AdbCli,
    private readonly restartDelayMs: number
  ) {
    super();
  }

  get running(): boolean {
    return this.child !== null;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.spawnStream();
  }

  stop(): void {
    this.stopped = true;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.child) {
      this.child.kill('SIGTERM');
      this.child = null;
    }
  }

  private spawnStream(): void {
    const child = this.cli.spawnShell(['uiautomator', 'events']);
    this.child = child;

    const lines = createInterface({ input: child.stdout });
    lines.on('line', line => {
      const notification = parseEventLine(line);
      if (notification) {
        this.emit('notification', notification);
      }
    });

    child.stderr.on('data', (data: Buffer) => {
      log.debug('stream_stderr', data.toString().trim());
    });

    child.on('spawn', () => {
      log.info('stream_connected', `Following UI events on ${this.cli.serial}`);
      this.emit('connected');
    });

    child.on('error', error => {
      log.error('stream_error', 'UI event stream failed', error);
    });

    child.on('close', code => {
      lines.close();
      if (this.child === child) {
        this.child = null;
      }
      this.emit('disconnected', code);
      if (!this.stopped) {
        log.warn('stream_closed', `UI event stream ended (code ${code}), restarting in ${this.restartDelayMs}ms`);
        this.restartTimer = setTimeout(() => {
          this.restartTimer = null;
          if (!this.stopped) {
            this.spawnStream();
          }
        }, this.restartDelayMs);
      }
    });
  }
}
