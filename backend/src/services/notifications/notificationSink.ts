/**
 * Informational messages for the operator ("Connection accepted",
 * "Screen sharing started").
 */

import { AdbCli, shellQuote } from '../androidCli';
import { createServiceLogger } from '../logger';

const log = createServiceLogger('notifications');

export interface FlowNotice {
  message: string;
  traceId?: string;
}

export interface NotificationSink {
  notify(notice: FlowNotice): Promise<void>;
}

export class LogNotificationSink implements NotificationSink {
  async notify({ message, traceId }: FlowNotice): Promise<void> {
    log.info('flow_notice', message, traceId);
  }
}

/**
 * Posts the message to the device's notification shade, then logs it
 */
export class DeviceNotificationSink implements NotificationSink {
  private readonly fallback = new LogNotificationSink();

  constructor(
    private readonly cli: AdbCli,
    private readonly title: string,
    private readonly tag = 'share-pilot'
  ) {}

  async notify(notice: FlowNotice): Promise<void> {
    const result = await this.cli.shell([
      'cmd',
      'notification',
      'post',
      '-S',
      'bigtext',
      '-t',
      shellQuote(this.title),
      this.tag,
      shellQuote(notice.message)
    ]);

    if (result.code !== 0) {
      log.warn('device_notice_failed', `cmd notification exited with ${result.code}`, notice.traceId, {
        stderr: result.stderr.trim()
      });
    }
    await this.fallback.notify(notice);
  }
}
