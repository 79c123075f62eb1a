import { CommandResult } from '../types/command.types';
import { DEFAULT_SSH_HOST, SshTestResult } from '../types/profile.types';
import { SshConnectionTester } from '../core/ssh.connection';

/**
 * SSH connectivity check against a git host
 */
export class SshCommand {
  private readonly tester: SshConnectionTester;

  constructor(tester?: SshConnectionTester) {
    this.tester = tester ?? new SshConnectionTester();
  }

  public async test(host: string = DEFAULT_SSH_HOST): Promise<CommandResult<SshTestResult>> {
    const result = this.tester.test(host);

    switch (result.status) {
      case 'success':
        return {
          success: true,
          message: `SSH connection to ${host} successful!`,
          data: result,
          exitCode: 0,
        };
      case 'timeout':
        return { success: false, message: 'SSH connection timed out', data: result, exitCode: 1 };
      case 'failed':
        return {
          success: false,
          message: `SSH connection failed: ${result.message}`,
          data: result,
          exitCode: 1,
        };
      case 'error':
        return {
          success: false,
          message: `SSH test failed: ${result.message}`,
          data: result,
          exitCode: 1,
        };
    }
  }
}
