import type { Logger } from 'pino';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError, errorMessage } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import { KeyedMutex } from '../../utils/keyed-lock.js';
import { createVmSchema, type CreateVmInput } from '../../schemas/vm.schema.js';
import { paginationSchema, type PaginationInput } from '../../schemas/event.schema.js';
import { vmWorkspaceName } from '../../schemas/provisioning.schema.js';
import type { VmRepository } from '../../adapters/db/repositories/vm.repository.js';
import type { Credential } from '../entities/credential.entity.js';
import type { Vm, VmStatus } from '../entities/vm.entity.js';
import { canAccess, type Viewer } from '../entities/viewer.entity.js';
import type { ComputeAdapterFactory, IComputeAdapter, InstanceLocator } from '../ports/compute.port.js';
import type { IWorkspaceManager, TerraformVariables } from '../ports/provisioning.port.js';
import type { CredentialService } from './credential.service.js';
import type { OperationTracker } from './operation-tracker.js';
import type { ProvisioningOrchestrator } from './provisioning.orchestrator.js';
import { normalizeVmStatus } from './vm-status.js';

export const DEFAULT_AMI_ID = 'ami-0c55b159cbfafe1f0';
export const DEFAULT_GCE_IMAGE = 'debian-cloud/debian-11';

export interface VmServiceDeps {
  vms: VmRepository;
  credentials: CredentialService;
  orchestrator: ProvisioningOrchestrator;
  workspaces: IWorkspaceManager;
  tracker: OperationTracker;
  compute: ComputeAdapterFactory;
  log?: Logger;
}

interface TerraformInputs {
  variables: TerraformVariables;
  secrets: Record<string, string>;
}

/**
 * Variables and secrets for the provider templates. Secrets travel only as
 * TF_VAR_* environment entries.
 */
export function buildTerraformInputs(input: CreateVmInput, credentials: Record<string, string>): TerraformInputs {
  if (input.provider === 'aws') {
    const variables: TerraformVariables = {
      name: input.name,
      region: input.region,
      instance_type: input.instanceType,
      ami_id: input.amiId ?? DEFAULT_AMI_ID,
      security_group_ids: input.securityGroupIds ?? [],
    };
    if (input.keyName) {
      variables.key_name = input.keyName;
    }
    return {
      variables,
      secrets: {
        access_key: credentials.access_key ?? '',
        secret_key: credentials.secret_key ?? '',
      },
    };
  }

  return {
    variables: {
      name: input.name,
      project_id: credentials.project_id ?? '',
      region: input.region,
      zone: input.zone ?? `${input.region}-a`,
      machine_type: input.instanceType,
      image: input.image ?? DEFAULT_GCE_IMAGE,
    },
    secrets: {
      credentials_json: JSON.stringify({ type: 'service_account', ...credentials }),
    },
  };
}

export class VmService {
  private readonly log: Logger;
  private readonly locks = new KeyedMutex();

  constructor(private readonly deps: VmServiceDeps) {
    this.log = deps.log ?? createComponentLogger('vm');
  }

  async createVm(viewer: Viewer, input: unknown, signal?: AbortSignal): Promise<Vm> {
    const parsed = createVmSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'VM request');
    }
    const request = parsed.data;

    const credential = this.deps.credentials.requireAccessible(viewer, request.credentialId);
    if (credential.provider !== request.provider) {
      throw new ValidationError(
        `Credential ${credential.id} is for ${credential.provider}, not ${request.provider}`
      );
    }
    // decryption failures stop here, before any record or provisioning
    const decrypted = this.deps.credentials.decrypt(credential);
    const { variables, secrets } = buildTerraformInputs(request, decrypted);

    return this.deps.tracker.track(
      {
        eventType: 'vm_create',
        params: { userId: viewer.userId, ...request },
        userId: (p) => p.userId,
        credentialId: (p) => p.credentialId,
      },
      async (ctx) => {
        const vm = this.deps.vms.create({
          name: request.name,
          provider: request.provider,
          instanceType: request.instanceType,
          region: request.region,
          zone: request.provider === 'gcp' ? request.zone ?? `${request.region}-a` : null,
          credentialId: credential.id,
          userId: viewer.userId,
        });
        ctx.link({ vmId: vm.id });

        return this.locks.runExclusive(this.lockKey(vm.id), async () => {
          try {
            const facts = await this.deps.orchestrator.apply({
              provider: request.provider,
              workspace: vmWorkspaceName(vm.id),
              variables,
              secrets,
              userId: viewer.userId,
              vmId: vm.id,
              credentialId: credential.id,
              signal,
            });
            const updated = this.deps.vms.update(vm.id, {
              instanceId: facts.instanceId,
              publicIp: facts.publicIp,
              privateIp: facts.privateIp,
              status: normalizeVmStatus(request.provider, facts.status),
            });
            this.log.info({ vmId: vm.id, instanceId: facts.instanceId }, 'VM created');
            return updated;
          } catch (error) {
            this.markFailed(vm.id);
            throw error;
          }
        });
      }
    );
  }

  getVm(viewer: Viewer, id: number): Vm {
    return this.requireAccessible(viewer, id);
  }

  listVms(viewer: Viewer, page: PaginationInput = {}): Vm[] {
    const parsed = paginationSchema.safeParse(page);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'pagination');
    }
    return this.deps.vms.findAll(this.scope(viewer), parsed.data.limit, parsed.data.offset);
  }

  countVms(viewer: Viewer): number {
    return this.deps.vms.count(this.scope(viewer));
  }

  countVmsByStatus(viewer: Viewer): Partial<Record<VmStatus, number>> {
    return this.deps.vms.countByStatus(this.scope(viewer));
  }

  refreshVm(viewer: Viewer, id: number): Promise<Vm> {
    return this.locks.runExclusive(this.lockKey(id), async () => {
      const vm = this.requireAccessible(viewer, id);
      const locator = this.locatorFor(vm);
      const adapter = this.adapterFor(vm);

      return this.deps.tracker.track(
        {
          eventType: 'vm_status_update',
          params: { userId: viewer.userId, vmId: id, instanceId: locator.instanceId },
          userId: (p) => p.userId,
          vmId: (p) => p.vmId,
        },
        async () => {
          const described = await adapter.describeInstance(locator);
          return this.deps.vms.update(id, {
            status: normalizeVmStatus(vm.provider, described.state),
            publicIp: described.publicIp,
            privateIp: described.privateIp,
          });
        }
      );
    });
  }

  startVm(viewer: Viewer, id: number): Promise<Vm> {
    return this.transition(viewer, id, 'vm_start', 'stopped', 'running', (adapter, locator) =>
      adapter.startInstance(locator)
    );
  }

  stopVm(viewer: Viewer, id: number): Promise<Vm> {
    return this.transition(viewer, id, 'vm_stop', 'running', 'stopped', (adapter, locator) =>
      adapter.stopInstance(locator)
    );
  }

  deleteVm(viewer: Viewer, id: number, signal?: AbortSignal): Promise<{ deleted: true; vmId: number }> {
    return this.locks.runExclusive(this.lockKey(id), async () => {
      const vm = this.requireAccessible(viewer, id);
      const workspace = vmWorkspaceName(id);
      const hasWorkspace = await this.deps.workspaces.exists(workspace);
      const credential = hasWorkspace || vm.instanceId ? this.loadCredential(vm) : null;
      const decrypted = credential ? this.deps.credentials.decrypt(credential) : null;

      return this.deps.tracker.track(
        {
          eventType: 'vm_delete',
          params: { userId: viewer.userId, vmId: id, workspace, instanceId: vm.instanceId },
          userId: (p) => p.userId,
          vmId: (p) => p.vmId,
          credentialId: () => vm.credentialId,
        },
        async () => {
          if (hasWorkspace && decrypted) {
            const { secrets } = buildTerraformInputs(this.createInputFor(vm), decrypted);
            await this.deps.orchestrator.destroy({
              workspace,
              secrets,
              userId: viewer.userId,
              vmId: id,
              credentialId: vm.credentialId,
              signal,
            });
          } else if (vm.instanceId && decrypted) {
            await this.deps.compute(vm.provider, decrypted).terminateInstance(this.locatorFor(vm));
          }

          this.deps.vms.delete(id);
          this.log.info({ vmId: id, destroyed: hasWorkspace }, 'VM deleted');
          return { deleted: true as const, vmId: id };
        }
      );
    });
  }

  private transition(
    viewer: Viewer,
    id: number,
    eventType: 'vm_start' | 'vm_stop',
    from: VmStatus,
    to: VmStatus,
    action: (adapter: IComputeAdapter, locator: InstanceLocator) => Promise<void>
  ): Promise<Vm> {
    return this.locks.runExclusive(this.lockKey(id), async () => {
      const vm = this.requireAccessible(viewer, id);
      if (vm.status !== from) {
        throw new ConflictError(`VM ${id} is ${vm.status}; it must be ${from}`, { vmId: id, status: vm.status });
      }
      const locator = this.locatorFor(vm);
      const adapter = this.adapterFor(vm);

      return this.deps.tracker.track(
        {
          eventType,
          params: { userId: viewer.userId, vmId: id, instanceId: locator.instanceId },
          userId: (p) => p.userId,
          vmId: (p) => p.vmId,
        },
        async () => {
          await action(adapter, locator);
          return this.deps.vms.update(id, { status: to });
        }
      );
    });
  }

  private requireAccessible(viewer: Viewer, id: number): Vm {
    const vm = this.deps.vms.findById(id);
    if (!vm) {
      throw new NotFoundError('VM', id);
    }
    if (!canAccess(viewer, vm.userId)) {
      throw new ForbiddenError(`VM ${id} belongs to another user`);
    }
    return vm;
  }

  private loadCredential(vm: Vm): Credential {
    return this.deps.credentials.requireAccessible({ userId: vm.userId, isAdmin: true }, vm.credentialId);
  }

  private adapterFor(vm: Vm): IComputeAdapter {
    return this.deps.compute(vm.provider, this.deps.credentials.decrypt(this.loadCredential(vm)));
  }

  private locatorFor(vm: Vm): InstanceLocator {
    if (!vm.instanceId) {
      throw new ConflictError(`VM ${vm.id} has no instance id`, { vmId: vm.id, status: vm.status });
    }
    return { instanceId: vm.instanceId, region: vm.region, zone: vm.zone };
  }

  private createInputFor(vm: Vm): CreateVmInput {
    return {
      name: vm.name,
      provider: vm.provider,
      instanceType: vm.instanceType,
      region: vm.region,
      credentialId: vm.credentialId,
      zone: vm.zone ?? undefined,
    };
  }

  private markFailed(vmId: number): void {
    try {
      this.deps.vms.update(vmId, { status: 'failed' });
    } catch (error) {
      this.log.error({ vmId, err: errorMessage(error) }, 'Failed to mark VM as failed');
    }
  }

  private scope(viewer: Viewer): string | undefined {
    return viewer.isAdmin ? undefined : viewer.userId;
  }

  private lockKey(vmId: number): string {
    return vmWorkspaceName(vmId);
  }
}
