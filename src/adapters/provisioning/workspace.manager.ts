import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { TemplateMissingError, ValidationError, WorkspaceNotFoundError, errorMessage } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import { isSensitiveKey } from '../../utils/mask.js';
import { cloudProviderSchema } from '../../schemas/vm.schema.js';
import { workspaceNameSchema } from '../../schemas/provisioning.schema.js';
import type { CloudProvider } from '../../domain/entities/vm.entity.js';
import type {
  IWorkspaceManager,
  PreparedWorkspace,
  TerraformVariables,
} from '../../domain/ports/provisioning.port.js';

export const VARIABLES_FILE = 'terraform.tfvars.json';
export const POINTER_FILE = 'workspace.json';

const pointerSchema = z.object({
  current: z.string().regex(/^attempt-[A-Za-z0-9]+$/),
  provider: cloudProviderSchema,
  updatedAt: z.string(),
});

export interface WorkspaceManagerOptions {
  templatesDir: string;
  workspacesDir: string;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Filesystem-backed workspaces. Each apply gets a fresh
 * `<workspacesDir>/<name>/attempt-XXXXXX/` directory; `workspace.json` beside
 * the attempts names the one destroy should run in.
 */
export class WorkspaceManager implements IWorkspaceManager {
  private readonly log: Logger;

  constructor(
    private readonly options: WorkspaceManagerOptions,
    log: Logger = createComponentLogger('workspace')
  ) {
    this.log = log;
  }

  async prepareApply(name: string, provider: CloudProvider, variables: TerraformVariables): Promise<PreparedWorkspace> {
    const root = this.rootFor(name);
    const templateDir = path.join(this.options.templatesDir, provider);
    const templates = await this.listTemplates(provider, templateDir);

    await fs.mkdir(root, { recursive: true });
    const directory = await fs.mkdtemp(path.join(root, 'attempt-'));

    for (const file of templates) {
      await fs.copyFile(path.join(templateDir, file), path.join(directory, file));
    }

    const fileVariables = Object.fromEntries(
      Object.entries(variables).filter(([key]) => !isSensitiveKey(key))
    );
    await fs.writeFile(path.join(directory, VARIABLES_FILE), JSON.stringify(fileVariables, null, 2));

    await this.writePointer(root, path.basename(directory), provider);
    this.log.info({ workspace: name, directory, templates: templates.length }, 'Prepared workspace');

    return { name, provider, directory };
  }

  async locateForDestroy(name: string): Promise<PreparedWorkspace> {
    const root = this.rootFor(name);
    const pointer = await this.readPointer(root);
    if (!pointer) {
      throw new WorkspaceNotFoundError(name);
    }

    const directory = path.join(root, pointer.current);
    if (!(await pathExists(directory))) {
      this.log.warn({ workspace: name, directory }, 'Workspace pointer names a missing attempt');
      throw new WorkspaceNotFoundError(name);
    }

    return { name, provider: pointer.provider, directory };
  }

  async discard(workspace: PreparedWorkspace): Promise<void> {
    const root = this.rootFor(workspace.name);
    await fs.rm(workspace.directory, { recursive: true, force: true });

    const pointer = await this.readPointer(root);
    if (pointer && pointer.current !== path.basename(workspace.directory)) {
      return;
    }

    const latest = await this.latestAttempt(root);
    if (latest) {
      await this.writePointer(root, latest, workspace.provider);
    } else {
      await fs.rm(root, { recursive: true, force: true });
    }
    this.log.info({ workspace: workspace.name, directory: workspace.directory }, 'Discarded unused attempt');
  }

  async remove(name: string): Promise<void> {
    await fs.rm(this.rootFor(name), { recursive: true, force: true });
    this.log.info({ workspace: name }, 'Removed workspace');
  }

  async exists(name: string): Promise<boolean> {
    return (await this.readPointer(this.rootFor(name))) !== null;
  }

  private rootFor(name: string): string {
    if (!workspaceNameSchema.safeParse(name).success) {
      throw new ValidationError(`Invalid workspace name "${name}"`, { workspace: name });
    }
    return path.join(this.options.workspacesDir, name);
  }

  private async listTemplates(provider: CloudProvider, templateDir: string): Promise<string[]> {
    const entries = await fs.readdir(templateDir, { withFileTypes: true }).catch(() => null);
    if (!entries) {
      throw new TemplateMissingError(provider, templateDir);
    }
    const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    if (files.length === 0) {
      throw new TemplateMissingError(provider, templateDir);
    }
    return files.sort();
  }

  private async readPointer(root: string): Promise<z.infer<typeof pointerSchema> | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(root, POINTER_FILE), 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed = pointerSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      this.log.warn({ root, issues: parsed.error.issues.length }, 'Ignoring malformed workspace pointer');
    } catch (error) {
      this.log.warn({ root, err: errorMessage(error) }, 'Ignoring unreadable workspace pointer');
    }
    return null;
  }

  private async writePointer(root: string, current: string, provider: CloudProvider): Promise<void> {
    const pointer = { current, provider, updatedAt: new Date().toISOString() };
    await fs.writeFile(path.join(root, POINTER_FILE), JSON.stringify(pointer, null, 2));
  }

  private async latestAttempt(root: string): Promise<string | null> {
    const entries = await fs.readdir(root, { withFileTypes: true }).catch(() => null);
    if (!entries) {
      return null;
    }

    let latest: { name: string; mtime: number } | null = null;
    for (const entry of entries) {
      if (!entry.isDirectory() || !entry.name.startsWith('attempt-')) continue;
      const stat = await fs.stat(path.join(root, entry.name));
      if (!latest || stat.mtimeMs > latest.mtime) {
        latest = { name: entry.name, mtime: stat.mtimeMs };
      }
    }
    return latest?.name ?? null;
  }
}
