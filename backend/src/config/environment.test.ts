/**
 * Environment Configuration Tests
 */

import { getConfigSummary, loadEnvironmentConfig } from './environment';
import { ConfigValidationError } from '../utils/errors';

describe('Environment Configuration', () => {
  describe('loadEnvironmentConfig', () => {
    it('should fall back to defaults on an empty environment', () => {
      const config = loadEnvironmentConfig({});

      expect(config.device).toEqual({
        serial: 'emulator-5554',
        adbPath: 'adb',
        dumpPath: '/sdcard/window_dump.xml',
        commandTimeoutMs: 10_000
      });
      expect(config.applications).toEqual({
        sourcePackage: 'com.anydesk.anydeskandroid',
        companionPackage: 'com.android.systemui'
      });
      expect(config.triggerKinds).toEqual(['window-state-changed']);
      expect(config.timing).toEqual({
        minProcessIntervalMs: 800,
        settleDelayMs: 400,
        sourceSettleMs: 300,
        companionSettleMs: 500,
        stuckTimeoutMs: 30_000,
        focusSettleMs: 50,
        alternateFocusSettleMs: 100,
        chooserReprocessMs: 800,
        fallbackReprocessMs: 500,
        confirmRetryMs: 1_000,
        eventStreamRestartMs: 2_000
      });
      expect(config.statusApi).toEqual({ enabled: true, host: '127.0.0.1', port: 3001 });
      expect(config.notifications).toEqual({ device: false, title: 'Share Pilot' });
      expect(config.variantsPath).toBeUndefined();
    });

    it('should coerce numbers and flags', () => {
      const config = loadEnvironmentConfig({
        STUCK_TIMEOUT_MS: '45000',
        SETTLE_DELAY_MS: ' 250 ',
        STATUS_API_ENABLED: '0',
        DEVICE_NOTIFICATIONS: 'true',
        STATUS_API_PORT: '8080'
      });

      expect(config.timing.stuckTimeoutMs).toBe(45_000);
      expect(config.timing.settleDelayMs).toBe(250);
      expect(config.statusApi).toMatchObject({ enabled: false, port: 8080 });
      expect(config.notifications.device).toBe(true);
    });

    it('should treat blank values as unset', () => {
      const config = loadEnvironmentConfig({ ADB_SERIAL: '   ', UI_VARIANTS_PATH: '' });

      expect(config.device.serial).toBe('emulator-5554');
      expect(config.variantsPath).toBeUndefined();
    });

    it('should parse the trigger kind list', () => {
      const config = loadEnvironmentConfig({ TRIGGER_EVENT_KINDS: 'window-state-changed, content-changed,' });

      expect(config.triggerKinds).toEqual(['window-state-changed', 'content-changed']);
    });

    it('should report every invalid variable', () => {
      const load = () =>
        loadEnvironmentConfig({
          SOURCE_APP_PACKAGE: 'not a package',
          STUCK_TIMEOUT_MS: '10',
          TRIGGER_EVENT_KINDS: 'scroll'
        });

      expect(load).toThrow(ConfigValidationError);
      try {
        load();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.message).toBe('Invalid environment configuration (3 issue(s))');
          expect(error.issues.map(issue => issue.split(':')[0]).sort()).toEqual([
            'SOURCE_APP_PACKAGE',
            'STUCK_TIMEOUT_MS',
            'TRIGGER_EVENT_KINDS.0'
          ]);
        }
      }
    });
  });

  describe('getConfigSummary', () => {
    it('should summarise the operational settings', () => {
      const summary = getConfigSummary(loadEnvironmentConfig({ ADB_SERIAL: 'test-device' }));

      expect(summary).toEqual({
        device: 'test-device',
        applications: {
          sourcePackage: 'com.anydesk.anydeskandroid',
          companionPackage: 'com.android.systemui'
        },
        triggerKinds: ['window-state-changed'],
        stuckTimeoutMs: 30_000,
        minProcessIntervalMs: 800,
        settleDelayMs: 400,
        deviceNotifications: false
      });
    });
  });
});
