import { AdbCli, type CommandResult, type RunOptions } from '../../src/services/androidCli';

export type ShellResponder = (args: string[]) => Partial<CommandResult>;

/**
 * adb stand-in that records shell invocations instead of spawning adb
 */
export class FakeAdbCli extends AdbCli {
  readonly calls: string[][] = [];

  constructor(private readonly responder: ShellResponder = () => ({})) {
    super('test-device');
  }

  async shell(shellArgs: string[], _options?: RunOptions): Promise<CommandResult> {
    this.calls.push(shellArgs);
    return { code: 0, stdout: '', stderr: '', ...this.responder(shellArgs) };
  }
}
