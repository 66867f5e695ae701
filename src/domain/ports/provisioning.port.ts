import type { CloudProvider } from '../entities/vm.entity.js';
import type { JsonValue } from '../../utils/serialize.js';

export type TerraformCommand = 'init' | 'plan' | 'apply' | 'destroy';

export type VariableValue = string | number | boolean | string[] | { [key: string]: JsonValue };

export type TerraformVariables = Record<string, VariableValue>;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Extra environment entries, layered over the parent's environment */
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs the provisioning tool. Nonzero exits resolve normally; only timeout,
 * cancellation and spawn failures reject.
 */
export interface ICommandRunner {
  run(command: TerraformCommand, cwd: string, options?: RunOptions): Promise<CommandResult>;
}

export interface PreparedWorkspace {
  name: string;
  provider: CloudProvider;
  /** Directory the tool runs in */
  directory: string;
}

export interface IWorkspaceManager {
  prepareApply(name: string, provider: CloudProvider, variables: TerraformVariables): Promise<PreparedWorkspace>;
  locateForDestroy(name: string): Promise<PreparedWorkspace>;
  /** Drop an attempt directory that never ran */
  discard(workspace: PreparedWorkspace): Promise<void>;
  /** Remove every attempt of a workspace */
  remove(name: string): Promise<void>;
  exists(name: string): Promise<boolean>;
}

export interface InstanceFacts {
  instanceId: string | null;
  publicIp: string | null;
  privateIp: string | null;
  /** Provider-reported state, normalised by the VM layer */
  status: string;
  outputs: Record<string, string>;
  createdResources: string[];
}

export interface DestroyAck {
  workspace: string;
  destroyedResources: string[];
}
