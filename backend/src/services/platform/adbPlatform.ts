/**
 * Device-backed platform: window trees come from `uiautomator dump`, actions
 * go out as `input` commands at the element's centre.
 */

import type { DeviceConfig } from '../../config/environment';
import type { NodeAction, UiTreeNode } from '../../types/uiTree';
import { UiDumpError } from '../../utils/errors';
import { parseUiHierarchy } from '../../utils/uiHierarchy';
import { AdbCli } from '../androidCli';
import { createServiceLogger } from '../logger';
import { TreeUiPlatform, type ActionDriver, type TreeSource } from './treePlatform';

const LONG_PRESS_MS = 700;

const log = createServiceLogger('adb-platform');

/** uiautomator reports a missing window on stdout with exit code 0 */
const NO_WINDOW_PATTERN = /null root node|could not get idle state/i;

export function createDumpSource(cli: AdbCli, dumpPath: string): TreeSource {
  return async () => {
    const dump = await cli.shell(['uiautomator', 'dump', dumpPath]);
    if (NO_WINDOW_PATTERN.test(dump.stdout) || NO_WINDOW_PATTERN.test(dump.stderr)) {
      return null;
    }
    if (dump.code !== 0) {
      throw new UiDumpError('uiautomator dump failed', { code: dump.code, stderr: dump.stderr.trim() });
    }

    const read = await cli.shell(['cat', dumpPath]);
    if (read.code !== 0) {
      throw new UiDumpError(`Cannot read ${dumpPath}`, { code: read.code, stderr: read.stderr.trim() });
    }
    return parseUiHierarchy(read.stdout);
  };
}

const centreOf = (node: UiTreeNode): [number, number] => [
  Math.round((node.bounds.left + node.bounds.right) / 2),
  Math.round((node.bounds.top + node.bounds.bottom) / 2)
];

export class AdbActionDriver implements ActionDriver {
  constructor(private readonly cli: AdbCli) {}

  async perform(node: UiTreeNode, action: NodeAction): Promise<boolean> {
    const [x, y] = centreOf(node);
    if (x <= 0 && y <= 0) {
      return false;
    }

    switch (action) {
      case 'click':
        return this.input(['tap', String(x), String(y)], action);
      case 'long-click':
        return this.input(['swipe', String(x), String(y), String(x), String(y), String(LONG_PRESS_MS)], action);
      case 'focus':
      case 'accessibility-focus':
        // `input` has no focus primitive; report it as not performed
        return false;
    }
  }

  private async input(args: string[], action: NodeAction): Promise<boolean> {
    const result = await this.cli.shell(['input', ...args]);
    if (result.code !== 0) {
      log.warn('input_failed', `input ${action} exited with ${result.code}`, undefined, {
        args,
        stderr: result.stderr.trim()
      });
      return false;
    }
    return true;
  }
}

export function createAdbPlatform(device: DeviceConfig): TreeUiPlatform {
  const cli = new AdbCli(device.serial, device.adbPath, device.commandTimeoutMs);
  return new TreeUiPlatform(createDumpSource(cli, device.dumpPath), new AdbActionDriver(cli));
}
