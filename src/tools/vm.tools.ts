import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { VmService } from '../domain/services/vm.service.js';
import { respond, type ViewerResolver } from './tool-response.js';

export interface VmToolDeps {
  vms: VmService;
  viewerFor: ViewerResolver;
}

const userIdParam = z.string().min(1).describe('User on whose behalf the request runs');
const vmIdParam = z.number().int().positive().describe('VM id');

export function registerVmTools(server: McpServer, deps: VmToolDeps): void {
  const { vms, viewerFor } = deps;

  server.tool(
    'vm_create',
    'Provision a VM on AWS or GCP with Terraform. Blocks until the apply finishes.',
    {
      userId: userIdParam,
      name: z.string().describe('Instance name (lowercase letters, digits, hyphens)'),
      provider: z.enum(['aws', 'gcp']),
      instanceType: z.string().describe('e.g. t3.micro (AWS) or e2-micro (GCP)'),
      region: z.string().describe('e.g. us-east-1 or us-central1'),
      credentialId: z.number().int().positive().describe('Credential to provision with'),
      zone: z.string().optional().describe('GCP zone, defaults to <region>-a'),
      amiId: z.string().optional().describe('AWS AMI id'),
      keyName: z.string().optional().describe('AWS key pair name'),
      securityGroupIds: z.array(z.string()).optional().describe('AWS security group ids'),
      image: z.string().optional().describe('GCP boot image'),
    },
    async ({ userId, ...input }, extra) =>
      respond(async () => ({ vm: await vms.createVm(viewerFor(userId), input, extra.signal) }))
  );

  server.tool(
    'vm_list',
    'List VMs visible to the user',
    {
      userId: userIdParam,
      limit: z.number().int().optional().describe('1..1000, default 100'),
      offset: z.number().int().optional().describe('Default 0'),
    },
    async ({ userId, limit, offset }) =>
      respond(() => {
        const viewer = viewerFor(userId);
        return {
          vms: vms.listVms(viewer, { limit, offset }),
          total: vms.countVms(viewer),
          byStatus: vms.countVmsByStatus(viewer),
        };
      })
  );

  server.tool(
    'vm_get',
    'Get one VM',
    { userId: userIdParam, vmId: vmIdParam },
    async ({ userId, vmId }) => respond(() => ({ vm: vms.getVm(viewerFor(userId), vmId) }))
  );

  server.tool(
    'vm_refresh',
    'Refresh a VM status and addresses from the cloud provider',
    { userId: userIdParam, vmId: vmIdParam },
    async ({ userId, vmId }) => respond(async () => ({ vm: await vms.refreshVm(viewerFor(userId), vmId) }))
  );

  server.tool(
    'vm_start',
    'Start a stopped VM',
    { userId: userIdParam, vmId: vmIdParam },
    async ({ userId, vmId }) => respond(async () => ({ vm: await vms.startVm(viewerFor(userId), vmId) }))
  );

  server.tool(
    'vm_stop',
    'Stop a running VM',
    { userId: userIdParam, vmId: vmIdParam },
    async ({ userId, vmId }) => respond(async () => ({ vm: await vms.stopVm(viewerFor(userId), vmId) }))
  );

  server.tool(
    'vm_delete',
    'Destroy a VM with Terraform and remove its record',
    { userId: userIdParam, vmId: vmIdParam },
    async ({ userId, vmId }, extra) =>
      respond(async () => ({ ...(await vms.deleteVm(viewerFor(userId), vmId, extra.signal)) }))
  );
}
