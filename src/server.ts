import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

// Import adapters for auto-registration (must be before the compute factory is used)
import './adapters/providers/aws/ec2.adapter.js';
import './adapters/providers/gcp/compute-engine.adapter.js';

import type { AppConfig } from './config.js';
import { CredentialRepository, EventRepository, VmRepository } from './adapters/db/repositories/index.js';
import { SecretStore } from './adapters/secrets/secret-store.js';
import { WorkspaceManager } from './adapters/provisioning/workspace.manager.js';
import { ProcessExecutor } from './adapters/provisioning/process.executor.js';
import { computeRegistry } from './domain/registry/compute.registry.js';
import type { ComputeAdapterFactory } from './domain/ports/compute.port.js';
import { OperationTracker } from './domain/services/operation-tracker.js';
import { ProvisioningOrchestrator } from './domain/services/provisioning.orchestrator.js';
import { CredentialService } from './domain/services/credential.service.js';
import { VmService } from './domain/services/vm.service.js';
import { HistoryService } from './domain/services/history.service.js';
import { registerHistoryTools } from './tools/history.tools.js';
import { registerVmTools } from './tools/vm.tools.js';
import { registerCredentialTools } from './tools/credential.tools.js';
import { createViewerResolver } from './tools/tool-response.js';

export interface AppServices {
  tracker: OperationTracker;
  orchestrator: ProvisioningOrchestrator;
  credentials: CredentialService;
  vms: VmService;
  history: HistoryService;
}

/**
 * Wire repositories, provisioning adapters and services from configuration.
 * The database must already be initialized.
 */
export function createServices(config: AppConfig): AppServices {
  const eventRepo = new EventRepository();
  const vmRepo = new VmRepository();
  const credentialRepo = new CredentialRepository();

  const tracker = new OperationTracker(eventRepo);
  const workspaces = new WorkspaceManager({
    templatesDir: config.templatesDir,
    workspacesDir: config.workspacesDir,
  });
  const executor = new ProcessExecutor({
    binary: config.terraformBinary,
    timeoutMs: config.commandTimeoutMs,
    killGraceMs: config.killGraceMs,
  });
  const orchestrator = new ProvisioningOrchestrator(workspaces, executor, tracker, {
    retainWorkspaces: config.retainWorkspaces,
  });

  const compute: ComputeAdapterFactory = (provider, creds) => computeRegistry.createAdapter(provider, creds);

  const credentials = new CredentialService({
    credentials: credentialRepo,
    vms: vmRepo,
    secrets: new SecretStore(config.encryptionKeyFile),
    tracker,
    compute,
  });
  const vms = new VmService({ vms: vmRepo, credentials, orchestrator, workspaces, tracker, compute });
  const history = new HistoryService(eventRepo, vmRepo);

  return { tracker, orchestrator, credentials, vms, history };
}

export function createServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: 'vmledger',
    version: '0.1.0',
  });

  const services = createServices(config);
  const viewerFor = createViewerResolver(config.adminUserIds);

  // Register all tool groups
  registerCredentialTools(server, { credentials: services.credentials, viewerFor });
  registerVmTools(server, { vms: services.vms, viewerFor });
  registerHistoryTools(server, { history: services.history, viewerFor });

  return server;
}
