import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { logger } from './logger';

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Adds Android SDK platform-tools to PATH so a bare `adb` resolves
 */
const getAndroidEnv = (customEnv?: NodeJS.ProcessEnv): NodeJS.ProcessEnv => {
  const homeDir = process.env.HOME || '/root';
  const androidRoot = process.env.ANDROID_SDK_ROOT?.replace(/^~/, homeDir) || `${homeDir}/Android`;

  return {
    ...process.env,
    ...customEnv,
    ANDROID_SDK_ROOT: androidRoot,
    PATH: `${process.env.PATH}:${androidRoot}/platform-tools`
  };
};

const runCommand = (
  executable: string,
  args: string[],
  { env, timeoutMs }: RunOptions = {}
): Promise<CommandResult> => {
  return new Promise((resolve, reject) => {
    const child = spawn(executable, args, {
      env: getAndroidEnv(env),
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    let timer: NodeJS.Timeout | undefined;

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      resolve({ code, stdout, stderr });
    });

    if (timeoutMs) {
      timer = setTimeout(() => {
        logger.warn('Command timeout, terminating', { executable, args, timeoutMs });
        child.kill('SIGKILL');
      }, timeoutMs);
      timer.unref();
    }
  });
};

/**
 * adb invocations bound to one device
 */
export class AdbCli {
  constructor(
    readonly serial: string,
    private readonly adbPath: string = 'adb',
    private readonly timeoutMs?: number
  ) {}

  run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return runCommand(this.adbPath, ['-s', this.serial, ...args], { timeoutMs: this.timeoutMs, ...options });
  }

  shell(shellArgs: string[], options?: RunOptions): Promise<CommandResult> {
    return this.run(['shell', ...shellArgs], options);
  }

  /**
   * Long-running shell command with its streams attached, e.g. `uiautomator events`
   */
  spawnShell(shellArgs: string[]): ChildProcessWithoutNullStreams {
    return spawn(this.adbPath, ['-s', this.serial, 'shell', ...shellArgs], {
      env: getAndroidEnv(),
      stdio: 'pipe'
    });
  }
}

/**
 * Quote a value for the device shell
 */
export const shellQuote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;
