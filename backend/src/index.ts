import type { Server } from 'http';
import { startServer } from './api/server';
import { getConfigSummary, loadEnvironmentConfig } from './config/environment';
import { loadUiVariants } from './config/uiVariants';
import { AdbCli } from './services/androidCli';
import { AutoAcceptService } from './services/autoAcceptService';
import { UiEventStream } from './services/events/uiEventStream';
import { logger, toError } from './services/logger';
import { DeviceNotificationSink, LogNotificationSink } from './services/notifications/notificationSink';
import { createAdbPlatform } from './services/platform/adbPlatform';
import type { ChangeNotification } from './types/flow';
import { ConfigValidationError } from './utils/errors';

function bootstrap() {
  const config = loadEnvironmentConfig();
  const variants = loadUiVariants(config.variantsPath);
  logger.info('Configuration loaded', getConfigSummary(config));

  const cli = new AdbCli(config.device.serial, config.device.adbPath, config.device.commandTimeoutMs);
  const service = new AutoAcceptService({
    config,
    platform: createAdbPlatform(config.device),
    variants,
    notifier: config.notifications.device
      ? new DeviceNotificationSink(cli, config.notifications.title)
      : new LogNotificationSink()
  });

  const events = new UiEventStream(cli, config.timing.eventStreamRestartMs);
  events.on('notification', (notification: ChangeNotification) => {
    service.onChange(notification);
  });
  events.on('connected', () => service.connect());
  events.on('disconnected', () => service.interrupt());

  const server: Server | null = config.statusApi.enabled
    ? startServer(service, config.statusApi.port, config.statusApi.host)
    : null;

  events.start();
  logger.info('Share pilot booted', { device: config.device.serial, statusApi: config.statusApi.enabled });

  const shutdown = (signal: string) => {
    logger.warn('Shutting down', { signal });
    events.stop();
    service.destroy();
    if (server) {
      server.close(() => {
        process.exit(0);
      });
    } else {
      process.exit(0);
    }
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: toError(reason).message });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message });
    process.exit(1);
  });
}

try {
  bootstrap();
} catch (error) {
  if (error instanceof ConfigValidationError) {
    logger.error('Bootstrap failed: invalid configuration', { issues: error.issues });
  } else {
    logger.error('Bootstrap failed', toError(error));
  }
  process.exit(1);
}
