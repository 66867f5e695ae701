import type { Logger } from 'pino';
import { CancelledError, ProcessFailureError, ValidationError, errorMessage } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import { workspaceNameSchema } from '../../schemas/provisioning.schema.js';
import { parseApplyOutput, parseDestroyOutput } from '../../adapters/provisioning/output.parser.js';
import type { CloudProvider } from '../entities/vm.entity.js';
import type {
  CommandResult,
  DestroyAck,
  ICommandRunner,
  IWorkspaceManager,
  InstanceFacts,
  PreparedWorkspace,
  TerraformVariables,
} from '../ports/provisioning.port.js';
import type { OperationTracker } from './operation-tracker.js';

const STDOUT_TAIL = 4000;

interface AttemptContext {
  userId?: string | null;
  vmId?: number | null;
  credentialId?: number | null;
  signal?: AbortSignal;
}

export interface ApplyRequest extends AttemptContext {
  provider: CloudProvider;
  workspace: string;
  /** Written to the variables file (sensitive names excepted) and passed as TF_VAR_* */
  variables: TerraformVariables;
  /** Passed only as TF_VAR_* entries; never written to disk or history */
  secrets?: Record<string, string>;
}

export interface DestroyRequest extends AttemptContext {
  workspace: string;
  secrets?: Record<string, string>;
}

export interface OrchestratorOptions {
  retainWorkspaces: boolean;
}

export function toTerraformEnv(
  variables: TerraformVariables,
  secrets: Record<string, string> = {}
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(variables)) {
    env[`TF_VAR_${name}`] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  for (const [name, value] of Object.entries(secrets)) {
    env[`TF_VAR_${name}`] = value;
  }
  return env;
}

function defaultState(provider: CloudProvider): string {
  return provider === 'gcp' ? 'RUNNING' : 'running';
}

/**
 * Drives one apply or destroy attempt: prepare the workspace, run the tool,
 * parse its output and record the attempt in history. Retries are left to
 * the caller, which must also serialise attempts for the same workspace.
 */
export class ProvisioningOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly workspaces: IWorkspaceManager,
    private readonly runner: ICommandRunner,
    private readonly tracker: OperationTracker,
    private readonly options: OrchestratorOptions,
    log: Logger = createComponentLogger('orchestrator')
  ) {
    this.log = log;
  }

  async apply(request: ApplyRequest): Promise<InstanceFacts> {
    this.assertWorkspaceName(request.workspace);
    const { provider, workspace, variables, secrets, signal } = request;

    return this.tracker.trackProvisioning(
      {
        eventType: 'provision_apply',
        params: { provider, workspace, variables, secrets },
        excludeParams: ['secrets'],
        userId: () => request.userId,
        vmId: () => request.vmId,
        credentialId: () => request.credentialId,
      },
      async () => {
        const prepared = await this.workspaces.prepareApply(workspace, provider, variables);
        const env = toTerraformEnv(variables, secrets);

        let result: CommandResult;
        try {
          await this.init(prepared, env, signal);
          result = await this.runner.run('apply', prepared.directory, { env, signal });
        } catch (error) {
          if (error instanceof CancelledError && (error.command === 'init' || !error.started)) {
            await this.discard(prepared);
          }
          throw error;
        }

        const parsed = parseApplyOutput(result.stdout, provider);
        if (result.exitCode !== 0) {
          throw new ProcessFailureError('apply', result.exitCode, result.stderr, {
            workspace,
            exitCode: result.exitCode,
            createdResources: parsed.createdResources,
            outputs: parsed.outputs,
            instanceId: parsed.instanceId,
            publicIp: parsed.publicIp,
            privateIp: parsed.privateIp,
            stdoutTail: result.stdout.slice(-STDOUT_TAIL),
          });
        }

        this.log.info(
          { workspace, instanceId: parsed.instanceId, resources: parsed.createdResources.length },
          'Apply completed'
        );
        return {
          instanceId: parsed.instanceId,
          publicIp: parsed.publicIp,
          privateIp: parsed.privateIp,
          status: parsed.instanceState ?? defaultState(provider),
          outputs: parsed.outputs,
          createdResources: parsed.createdResources,
        };
      }
    );
  }

  async destroy(request: DestroyRequest): Promise<DestroyAck> {
    this.assertWorkspaceName(request.workspace);
    const { workspace, secrets, signal } = request;

    // a missing workspace fails before any history is recorded
    const located = await this.workspaces.locateForDestroy(workspace);
    const env = toTerraformEnv({}, secrets);

    return this.tracker.trackProvisioning(
      {
        eventType: 'provision_destroy',
        params: { workspace, provider: located.provider },
        userId: () => request.userId,
        vmId: () => request.vmId,
        credentialId: () => request.credentialId,
      },
      async () => {
        await this.init(located, env, signal);
        const result = await this.runner.run('destroy', located.directory, { env, signal });
        const parsed = parseDestroyOutput(result.stdout);

        if (result.exitCode !== 0) {
          throw new ProcessFailureError('destroy', result.exitCode, result.stderr, {
            workspace,
            exitCode: result.exitCode,
            destroyedResources: parsed.destroyedResources,
            stdoutTail: result.stdout.slice(-STDOUT_TAIL),
          });
        }

        if (!this.options.retainWorkspaces) {
          await this.workspaces.remove(workspace).catch((error: unknown) => {
            this.log.warn({ workspace, err: errorMessage(error) }, 'Failed to remove workspace after destroy');
          });
        }

        this.log.info({ workspace, resources: parsed.destroyedResources.length }, 'Destroy completed');
        return { workspace, destroyedResources: parsed.destroyedResources };
      }
    );
  }

  private async init(workspace: PreparedWorkspace, env: Record<string, string>, signal?: AbortSignal): Promise<void> {
    const result = await this.runner.run('init', workspace.directory, { env, signal });
    if (result.exitCode !== 0) {
      // the following command fails with its own diagnostics if init mattered
      this.log.warn(
        { workspace: workspace.name, exitCode: result.exitCode, stderr: result.stderr.slice(-STDOUT_TAIL) },
        'terraform init exited nonzero'
      );
    }
  }

  private async discard(workspace: PreparedWorkspace): Promise<void> {
    try {
      await this.workspaces.discard(workspace);
    } catch (error) {
      this.log.error({ workspace: workspace.name, err: errorMessage(error) }, 'Failed to discard attempt directory');
    }
  }

  private assertWorkspaceName(name: string): void {
    if (!workspaceNameSchema.safeParse(name).success) {
      throw new ValidationError(`Invalid workspace name "${name}"`, { workspace: name });
    }
  }
}
