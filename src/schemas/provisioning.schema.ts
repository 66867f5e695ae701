import { z } from 'zod';

export const workspaceNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Workspace names use letters, digits, "_" and "-"');

export function vmWorkspaceName(vmId: number): string {
  return `vm-${vmId}`;
}
