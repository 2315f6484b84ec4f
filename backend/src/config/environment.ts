/**
 * Environment Configuration
 *
 * Reads every tunable of the automation service from environment variables,
 * validates them with zod and exposes a typed {@link AppConfig}. Defaults
 * match the timings the source and companion applications need on a
 * typical device.
 */

import { z } from 'zod';
import { CHANGE_KINDS, type ChangeKind } from '../types/flow';
import { ConfigValidationError } from '../utils/errors';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * ADB device connection
 */
export interface DeviceConfig {
  /** Device serial passed to `adb -s` */
  serial: string;
  /** adb executable */
  adbPath: string;
  /** On-device path uiautomator writes its dump to */
  dumpPath: string;
  /** Timeout applied to each adb invocation */
  commandTimeoutMs: number;
}

export interface ApplicationsConfig {
  /** Application showing the incoming connection dialog */
  sourcePackage: string;
  /** Application showing the screen-share permission flow */
  companionPackage: string;
}

export interface TimingConfig {
  /** Minimum gap between two accepted notifications */
  minProcessIntervalMs: number;
  /** Delay between an accepted notification and its processing cycle */
  settleDelayMs: number;
  /** Render wait inside a cycle for source application windows */
  sourceSettleMs: number;
  /** Render wait inside a cycle for companion application windows */
  companionSettleMs: number;
  /** No forward progress for this long resets the flow to Idle */
  stuckTimeoutMs: number;
  focusSettleMs: number;
  alternateFocusSettleMs: number;
  /** Follow-up cycle after the chooser option was picked */
  chooserReprocessMs: number;
  /** Follow-up cycle after a fallback transition */
  fallbackReprocessMs: number;
  /** Retry interval while the confirm button cannot be pressed */
  confirmRetryMs: number;
  /** Restart delay for the device event stream */
  eventStreamRestartMs: number;
}

export interface StatusApiConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface NotificationConfig {
  /** Post notifications on the device in addition to the log */
  device: boolean;
  title: string;
}

export interface AppConfig {
  device: DeviceConfig;
  applications: ApplicationsConfig;
  /** Notification kinds that schedule a processing cycle */
  triggerKinds: ChangeKind[];
  timing: TimingConfig;
  statusApi: StatusApiConfig;
  notifications: NotificationConfig;
  /** Override for the bundled UI variants file */
  variantsPath?: string;
}

// =============================================================================
// SCHEMA
// =============================================================================

const millis = (fallback: number) => z.coerce.number().int().min(0).max(600_000).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform(value => value === 'true' || value === '1');

const changeKindSchema = z.enum(['window-state-changed', 'content-changed', 'click', 'focus']);

const triggerKindsSchema = z
  .string()
  .default('window-state-changed')
  .transform(value => value.split(',').map(kind => kind.trim()).filter(kind => kind.length > 0))
  .pipe(z.array(changeKindSchema).min(1, `at least one of ${CHANGE_KINDS.join(', ')} required`));

const packageSchema = z.string().regex(/^[A-Za-z][\w]*(\.[A-Za-z_][\w]*)+$/, 'package name required');

export const EnvironmentSchema = z.object({
  ADB_SERIAL: z.string().min(1).default('emulator-5554'),
  ADB_PATH: z.string().min(1).default('adb'),
  UI_DUMP_PATH: z.string().min(1).default('/sdcard/window_dump.xml'),
  ADB_COMMAND_TIMEOUT_MS: millis(10_000),

  SOURCE_APP_PACKAGE: packageSchema.default('com.anydesk.anydeskandroid'),
  COMPANION_APP_PACKAGE: packageSchema.default('com.android.systemui'),
  TRIGGER_EVENT_KINDS: triggerKindsSchema,

  MIN_PROCESS_INTERVAL_MS: millis(800),
  SETTLE_DELAY_MS: millis(400),
  SOURCE_SETTLE_MS: millis(300),
  COMPANION_SETTLE_MS: millis(500),
  STUCK_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(600_000).default(30_000),
  FOCUS_SETTLE_MS: millis(50),
  ALTERNATE_FOCUS_SETTLE_MS: millis(100),
  CHOOSER_REPROCESS_MS: millis(800),
  FALLBACK_REPROCESS_MS: millis(500),
  CONFIRM_RETRY_MS: millis(1_000),
  EVENT_STREAM_RESTART_MS: millis(2_000),

  STATUS_API_ENABLED: flag(true),
  STATUS_API_HOST: z.string().min(1).default('127.0.0.1'),
  STATUS_API_PORT: z.coerce.number().int().min(0).max(65_535).default(3001),

  DEVICE_NOTIFICATIONS: flag(false),
  NOTIFICATION_TITLE: z.string().min(1).default('Share Pilot'),

  UI_VARIANTS_PATH: z.string().min(1).optional()
});

export type EnvironmentVariables = z.infer<typeof EnvironmentSchema>;

// =============================================================================
// LOADING
// =============================================================================

const blankToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const cleaned: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvironmentSchema.shape)) {
    const value = env[key];
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return cleaned;
};

/**
 * Parse and validate the environment into an {@link AppConfig}.
 *
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvironmentSchema.safeParse(blankToUndefined(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError(`Invalid environment configuration (${issues.length} issue(s))`, issues);
  }

  const vars = parsed.data;

  return {
    device: {
      serial: vars.ADB_SERIAL,
      adbPath: vars.ADB_PATH,
      dumpPath: vars.UI_DUMP_PATH,
      commandTimeoutMs: vars.ADB_COMMAND_TIMEOUT_MS
    },
    applications: {
      sourcePackage: vars.SOURCE_APP_PACKAGE,
      companionPackage: vars.COMPANION_APP_PACKAGE
    },
    triggerKinds: vars.TRIGGER_EVENT_KINDS,
    timing: {
      minProcessIntervalMs: vars.MIN_PROCESS_INTERVAL_MS,
      settleDelayMs: vars.SETTLE_DELAY_MS,
      sourceSettleMs: vars.SOURCE_SETTLE_MS,
      companionSettleMs: vars.COMPANION_SETTLE_MS,
      stuckTimeoutMs: vars.STUCK_TIMEOUT_MS,
      focusSettleMs: vars.FOCUS_SETTLE_MS,
      alternateFocusSettleMs: vars.ALTERNATE_FOCUS_SETTLE_MS,
      chooserReprocessMs: vars.CHOOSER_REPROCESS_MS,
      fallbackReprocessMs: vars.FALLBACK_REPROCESS_MS,
      confirmRetryMs: vars.CONFIRM_RETRY_MS,
      eventStreamRestartMs: vars.EVENT_STREAM_RESTART_MS
    },
    statusApi: {
      enabled: vars.STATUS_API_ENABLED,
      host: vars.STATUS_API_HOST,
      port: vars.STATUS_API_PORT
    },
    notifications: {
      device: vars.DEVICE_NOTIFICATIONS,
      title: vars.NOTIFICATION_TITLE
    },
    variantsPath: vars.UI_VARIANTS_PATH
  };
}

/**
 * Summary safe to print or expose over the status API
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    device: config.device.serial,
    applications: config.applications,
    triggerKinds: config.triggerKinds,
    stuckTimeoutMs: config.timing.stuckTimeoutMs,
    minProcessIntervalMs: config.timing.minProcessIntervalMs,
    settleDelayMs: config.timing.settleDelayMs,
    deviceNotifications: config.notifications.device
  };
}
