import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { CredentialService } from '../domain/services/credential.service.js';
import { respond, type ViewerResolver } from './tool-response.js';

export interface CredentialToolDeps {
  credentials: CredentialService;
  viewerFor: ViewerResolver;
}

const userIdParam = z.string().min(1).describe('User on whose behalf the request runs');
const credentialIdParam = z.number().int().positive().describe('Credential id');

export function registerCredentialTools(server: McpServer, deps: CredentialToolDeps): void {
  const { credentials, viewerFor } = deps;

  server.tool(
    'credential_create',
    'Store cloud credentials (encrypted at rest). AWS: access_key, secret_key, region. GCP: service account JSON fields.',
    {
      userId: userIdParam,
      name: z.string().describe('Display name'),
      provider: z.enum(['aws', 'gcp']),
      credentials: z.record(z.unknown()).describe('Provider-specific credentials object'),
    },
    async ({ userId, ...input }) =>
      respond(async () => ({ credential: await credentials.createCredential(viewerFor(userId), input) }))
  );

  server.tool(
    'credential_list',
    'List stored credentials (without secrets)',
    { userId: userIdParam },
    async ({ userId }) => respond(() => ({ credentials: credentials.listCredentials(viewerFor(userId)) }))
  );

  server.tool(
    'credential_update',
    'Rename a credential or replace its secret payload',
    {
      userId: userIdParam,
      credentialId: credentialIdParam,
      name: z.string().optional(),
      credentials: z.record(z.unknown()).optional().describe('Full replacement credentials object'),
    },
    async ({ userId, credentialId, ...input }) =>
      respond(async () => ({
        credential: await credentials.updateCredential(viewerFor(userId), credentialId, input),
      }))
  );

  server.tool(
    'credential_delete',
    'Delete a credential that no VM uses',
    { userId: userIdParam, credentialId: credentialIdParam },
    async ({ userId, credentialId }) =>
      respond(async () => ({ ...(await credentials.deleteCredential(viewerFor(userId), credentialId)) }))
  );

  server.tool(
    'credential_validate',
    'Check that stored credentials are accepted by the cloud provider',
    { userId: userIdParam, credentialId: credentialIdParam },
    async ({ userId, credentialId }) =>
      respond(async () => ({
        verification: await credentials.validateCredential(viewerFor(userId), credentialId),
      }))
  );
}
