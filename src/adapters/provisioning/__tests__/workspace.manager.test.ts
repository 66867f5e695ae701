import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { tmpdir } from 'os';
import { POINTER_FILE, VARIABLES_FILE, WorkspaceManager } from '../workspace.manager.js';
import { TemplateMissingError, ValidationError, WorkspaceNotFoundError } from '../../../lib/errors.js';

describe('WorkspaceManager', () => {
  let tempDir: string;
  let workspacesDir: string;
  let manager: WorkspaceManager;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'workspace-manager-test-'));
    const templatesDir = join(tempDir, 'templates');
    workspacesDir = join(tempDir, 'workspaces');
    mkdirSync(join(templatesDir, 'aws'), { recursive: true });
    writeFileSync(join(templatesDir, 'aws', 'main.tf'), 'resource "aws_instance" "vm" {}\n');
    writeFileSync(join(templatesDir, 'aws', 'variables.tf'), 'variable "name" {}\n');
    manager = new WorkspaceManager({ templatesDir, workspacesDir });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('prepareApply', () => {
    it('copies the templates and writes non-sensitive variables', async () => {
      const workspace = await manager.prepareApply('vm-1', 'aws', {
        name: 'web',
        region: 'us-east-1',
        security_group_ids: ['sg-1'],
        access_key: 'AKIDTEST',
        secret_key: 'test-secret',
        key_name: 'deploy',
      });

      expect(workspace.name).toBe('vm-1');
      expect(workspace.provider).toBe('aws');
      expect(dirname(workspace.directory)).toBe(join(workspacesDir, 'vm-1'));
      expect(basename(workspace.directory)).toMatch(/^attempt-[A-Za-z0-9]{6}$/);
      expect(readdirSync(workspace.directory).sort()).toEqual(['main.tf', VARIABLES_FILE, 'variables.tf']);
      expect(JSON.parse(readFileSync(join(workspace.directory, VARIABLES_FILE), 'utf-8'))).toEqual({
        name: 'web',
        region: 'us-east-1',
        security_group_ids: ['sg-1'],
      });
    });

    it('gives every apply a fresh directory and points at the newest', async () => {
      const first = await manager.prepareApply('vm-1', 'aws', { name: 'web' });
      const second = await manager.prepareApply('vm-1', 'aws', { name: 'web' });

      expect(second.directory).not.toBe(first.directory);
      expect(existsSync(first.directory)).toBe(true);
      const pointer = JSON.parse(readFileSync(join(workspacesDir, 'vm-1', POINTER_FILE), 'utf-8'));
      expect(pointer.current).toBe(basename(second.directory));
      expect(pointer.provider).toBe('aws');
      expect((await manager.locateForDestroy('vm-1')).directory).toBe(second.directory);
    });

    it('fails when the provider has no templates', async () => {
      await expect(manager.prepareApply('vm-2', 'gcp', { name: 'web' })).rejects.toBeInstanceOf(TemplateMissingError);
      expect(existsSync(join(workspacesDir, 'vm-2'))).toBe(false);
    });

    it('rejects names that would escape the workspaces directory', async () => {
      await expect(manager.prepareApply('../etc', 'aws', {})).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('locateForDestroy', () => {
    it('fails for unknown workspaces', async () => {
      await expect(manager.locateForDestroy('vm-9')).rejects.toThrow('Workspace vm-9 not found');
      await expect(manager.locateForDestroy('vm-9')).rejects.toBeInstanceOf(WorkspaceNotFoundError);
    });

    it('fails when the pointed-at attempt is gone', async () => {
      const workspace = await manager.prepareApply('vm-1', 'aws', { name: 'web' });
      rmSync(workspace.directory, { recursive: true });

      await expect(manager.locateForDestroy('vm-1')).rejects.toBeInstanceOf(WorkspaceNotFoundError);
    });
  });

  describe('discard', () => {
    it('falls back to the remaining attempt', async () => {
      const first = await manager.prepareApply('vm-1', 'aws', { name: 'web' });
      const second = await manager.prepareApply('vm-1', 'aws', { name: 'web' });

      await manager.discard(second);

      expect(existsSync(second.directory)).toBe(false);
      expect((await manager.locateForDestroy('vm-1')).directory).toBe(first.directory);
    });

    it('removes the workspace when no attempt remains', async () => {
      const only = await manager.prepareApply('vm-1', 'aws', { name: 'web' });

      await manager.discard(only);

      expect(await manager.exists('vm-1')).toBe(false);
      expect(existsSync(join(workspacesDir, 'vm-1'))).toBe(false);
    });
  });

  it('removes every attempt', async () => {
    await manager.prepareApply('vm-1', 'aws', { name: 'web' });
    await manager.prepareApply('vm-1', 'aws', { name: 'web' });
    expect(await manager.exists('vm-1')).toBe(true);

    await manager.remove('vm-1');

    expect(await manager.exists('vm-1')).toBe(false);
    expect(existsSync(join(workspacesDir, 'vm-1'))).toBe(false);
  });
});
