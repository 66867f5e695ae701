import { CancelledError } from '../../../lib/errors.js';
import type { CloudProvider } from '../../entities/vm.entity.js';
import type {
  IComputeAdapter,
  InstanceDescription,
  InstanceLocator,
  VerifyResult,
} from '../../ports/compute.port.js';
import type {
  CommandResult,
  ICommandRunner,
  RunOptions,
  TerraformCommand,
} from '../../ports/provisioning.port.js';

export type Responder = (cwd: string, options: RunOptions) => Promise<CommandResult> | CommandResult;

export interface RecordedCall {
  command: TerraformCommand;
  cwd: string;
  env: Record<string, string>;
}

export function ok(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: '' };
}

export const APPLY_STDOUT = [
  'aws_instance.vm: Creation complete after 1s [id=i-0abc1234]',
  '',
  'Outputs:',
  '',
  'instance_id = "i-0abc1234"',
  'public_ip = "203.0.113.10"',
  'private_ip = "10.0.0.5"',
].join('\n');

export const DESTROY_STDOUT = 'aws_instance.vm: Destruction complete after 3s\n\nDestroy complete! Resources: 1 destroyed.';

/** In-process stand-in for the terraform binary */
export class FakeRunner implements ICommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly responders: Partial<Record<TerraformCommand, Responder>> = {}) {}

  async run(command: TerraformCommand, cwd: string, options: RunOptions = {}): Promise<CommandResult> {
    if (options.signal?.aborted) {
      throw new CancelledError(command, false);
    }
    this.calls.push({ command, cwd, env: options.env ?? {} });
    const responder = this.responders[command];
    return responder ? responder(cwd, options) : ok('');
  }

  commands(): TerraformCommand[] {
    return this.calls.map((call) => call.command);
  }
}

export class FakeComputeAdapter implements IComputeAdapter {
  readonly calls: string[] = [];
  state = 'running';
  verifyResult: VerifyResult = { success: true, account: '123456789012' };

  constructor(readonly provider: CloudProvider) {}

  async verify(): Promise<VerifyResult> {
    this.calls.push('verify');
    return this.verifyResult;
  }

  async describeInstance(locator: InstanceLocator): Promise<InstanceDescription> {
    this.calls.push(`describe:${locator.instanceId}`);
    return { instanceId: locator.instanceId, state: this.state, publicIp: '203.0.113.20', privateIp: '10.0.0.20' };
  }

  async startInstance(locator: InstanceLocator): Promise<void> {
    this.calls.push(`start:${locator.instanceId}`);
  }

  async stopInstance(locator: InstanceLocator): Promise<void> {
    this.calls.push(`stop:${locator.instanceId}`);
  }

  async terminateInstance(locator: InstanceLocator): Promise<void> {
    this.calls.push(`terminate:${locator.instanceId}`);
  }
}
