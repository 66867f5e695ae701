import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getDb, initializeDatabase, SqliteAdapter } from '../../../adapters/db/sqlite.adapter.js';
import { EventRepository } from '../../../adapters/db/repositories/event.repository.js';
import { WorkspaceManager } from '../../../adapters/provisioning/workspace.manager.js';
import { ProcessExecutor } from '../../../adapters/provisioning/process.executor.js';
import {
  CancelledError,
  ProcessFailureError,
  TimeoutError,
  ValidationError,
  WorkspaceNotFoundError,
} from '../../../lib/errors.js';
import { OperationTracker } from '../operation-tracker.js';
import { ProvisioningOrchestrator, toTerraformEnv } from '../provisioning.orchestrator.js';
import type { ICommandRunner } from '../../ports/provisioning.port.js';
import { APPLY_STDOUT, DESTROY_STDOUT, FakeRunner, ok } from './fakes.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('ProvisioningOrchestrator', () => {
  let tempDir: string;
  let templatesDir: string;
  let workspaces: WorkspaceManager;
  let events: EventRepository;
  let tracker: OperationTracker;

  function orchestrator(runner: ICommandRunner, retainWorkspaces = true): ProvisioningOrchestrator {
    return new ProvisioningOrchestrator(workspaces, runner, tracker, { retainWorkspaces });
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'orchestrator-test-'));
    templatesDir = join(tempDir, 'templates');
    mkdirSync(join(templatesDir, 'aws'), { recursive: true });
    writeFileSync(join(templatesDir, 'aws', 'main.tf'), 'resource "aws_instance" "vm" {}\n');
    workspaces = new WorkspaceManager({ templatesDir, workspacesDir: join(tempDir, 'workspaces') });

    initializeDatabase(':memory:');
    events = new EventRepository(getDb());
    tracker = new OperationTracker(events);
  });

  afterEach(() => {
    SqliteAdapter.resetInstance();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('apply', () => {
    it('runs init then apply in a prepared workspace and records the facts', async () => {
      const runner = new FakeRunner({ apply: () => ok(APPLY_STDOUT) });

      const facts = await orchestrator(runner).apply({
        provider: 'aws',
        workspace: 'vm-1',
        variables: { name: 'web', region: 'us-east-1', instance_type: 't3.micro' },
        secrets: { access_key: 'AKIDTEST', secret_key: 'test-secret' },
        userId: 'alice',
        vmId: 1,
      });

      expect(facts).toEqual({
        instanceId: 'i-0abc1234',
        publicIp: '203.0.113.10',
        privateIp: '10.0.0.5',
        status: 'running',
        outputs: { instance_id: 'i-0abc1234', public_ip: '203.0.113.10', private_ip: '10.0.0.5' },
        createdResources: ['aws_instance.vm'],
      });

      expect(runner.commands()).toEqual(['init', 'apply']);
      const [init, apply] = runner.calls;
      expect(apply.cwd).toBe(init.cwd);
      expect(apply.env.TF_VAR_name).toBe('web');
      expect(apply.env.TF_VAR_secret_key).toBe('test-secret');
      expect(readFileSync(join(apply.cwd, 'terraform.tfvars.json'), 'utf-8')).not.toContain('test-secret');

      const [event] = events.list();
      expect(event.eventType).toBe('provision_apply');
      expect(event.status).toBe('success');
      expect(event.userId).toBe('alice');
      expect(event.vmId).toBe(1);
      expect(event.parameters).toEqual({
        provider: 'aws',
        workspace: 'vm-1',
        variables: { name: 'web', region: 'us-east-1', instance_type: 't3.micro' },
      });
      expect(event.result?.instanceId).toBe('i-0abc1234');
    });

    it('fails with the tool diagnostics on a nonzero exit and keeps the workspace', async () => {
      const stdout = 'aws_instance.vm: Creation complete after 1s [id=i-0abc1234]\n';
      const runner = new FakeRunner({
        apply: () => ({ exitCode: 1, stdout, stderr: 'Error: UnauthorizedOperation\n' }),
      });

      const error = await orchestrator(runner)
        .apply({ provider: 'aws', workspace: 'vm-1', variables: { name: 'web' }, userId: 'alice' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProcessFailureError);
      expect(error instanceof ProcessFailureError && error.message).toBe('Error: UnauthorizedOperation');

      const [event] = events.list();
      expect(event.status).toBe('failed');
      expect(event.errorMessage).toBe('Error: UnauthorizedOperation');
      expect(event.result).toMatchObject({
        workspace: 'vm-1',
        exitCode: 1,
        createdResources: ['aws_instance.vm'],
        instanceId: 'i-0abc1234',
        stdoutTail: stdout,
      });
      expect(await workspaces.exists('vm-1')).toBe(true);
    });

    it('continues to apply when init exits nonzero', async () => {
      const runner = new FakeRunner({
        init: () => ({ exitCode: 1, stdout: '', stderr: 'registry unreachable' }),
        apply: () => ok(APPLY_STDOUT),
      });

      const facts = await orchestrator(runner).apply({ provider: 'aws', workspace: 'vm-1', variables: {} });

      expect(runner.commands()).toEqual(['init', 'apply']);
      expect(facts.instanceId).toBe('i-0abc1234');
    });

    it('records a timed-out apply as failed', async () => {
      const runner = new FakeRunner({
        apply: () => {
          throw new TimeoutError('apply', 100);
        },
      });

      await expect(
        orchestrator(runner).apply({ provider: 'aws', workspace: 'vm-1', variables: {} })
      ).rejects.toBeInstanceOf(TimeoutError);

      const [event] = events.list();
      expect(event.status).toBe('failed');
      expect(event.errorMessage).toBe('terraform apply timed out after 100ms');
      expect(await workspaces.exists('vm-1')).toBe(true);
    });

    it('discards the attempt when cancelled before anything ran', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator(new FakeRunner()).apply({
          provider: 'aws',
          workspace: 'vm-1',
          variables: {},
          signal: controller.signal,
        })
      ).rejects.toBeInstanceOf(CancelledError);

      expect(await workspaces.exists('vm-1')).toBe(false);
      expect(events.list()[0].errorMessage).toBe('terraform init was cancelled');
    });

    it('rejects invalid workspace names without recording history', async () => {
      await expect(
        orchestrator(new FakeRunner()).apply({ provider: 'aws', workspace: 'bad name', variables: {} })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(events.count()).toBe(0);
    });

    it('keeps concurrent applies for different workspaces apart', async () => {
      const runner = new FakeRunner({
        apply: async (cwd) => {
          const { name } = JSON.parse(readFileSync(join(cwd, 'terraform.tfvars.json'), 'utf-8'));
          const n = Number(String(name).replace('web-', ''));
          await sleep((5 - n) * 10);
          return ok(`Outputs:\n\ninstance_id = "i-000${n}"\n`);
        },
      });
      const subject = orchestrator(runner);

      const results = await Promise.all(
        [1, 2, 3, 4, 5].map((n) =>
          subject.apply({ provider: 'aws', workspace: `vm-${n}`, variables: { name: `web-${n}` } })
        )
      );

      expect(results.map((facts) => facts.instanceId)).toEqual(['i-0001', 'i-0002', 'i-0003', 'i-0004', 'i-0005']);
      const applyDirs = runner.calls.filter((call) => call.command === 'apply').map((call) => call.cwd);
      expect(new Set(applyDirs).size).toBe(5);
      expect(events.count({ eventType: 'provision_apply', status: 'success' })).toBe(5);
    });
  });

  describe('destroy', () => {
    it('fails without history when the workspace does not exist', async () => {
      const runner = new FakeRunner();

      await expect(orchestrator(runner).destroy({ workspace: 'vm-9' })).rejects.toBeInstanceOf(WorkspaceNotFoundError);
      expect(runner.calls).toEqual([]);
      expect(events.count()).toBe(0);
    });

    it('destroys in the directory of the last apply and removes it when not retained', async () => {
      const runner = new FakeRunner({
        apply: () => ok(APPLY_STDOUT),
        destroy: () => ok(DESTROY_STDOUT),
      });
      const subject = orchestrator(runner, false);
      await subject.apply({ provider: 'aws', workspace: 'vm-1', variables: {} });

      const ack = await subject.destroy({
        workspace: 'vm-1',
        secrets: { secret_key: 'test-secret' },
        userId: 'alice',
      });

      expect(ack).toEqual({ workspace: 'vm-1', destroyedResources: ['aws_instance.vm'] });
      const applyCall = runner.calls.find((call) => call.command === 'apply');
      const destroyCall = runner.calls.find((call) => call.command === 'destroy');
      expect(destroyCall?.cwd).toBe(applyCall?.cwd);
      expect(destroyCall?.env.TF_VAR_secret_key).toBe('test-secret');
      expect(await workspaces.exists('vm-1')).toBe(false);

      const [event] = events.list({ eventType: 'provision_destroy' });
      expect(event.status).toBe('success');
      expect(event.parameters).toEqual({ workspace: 'vm-1', provider: 'aws' });
    });

    it('keeps the workspace when destroy exits nonzero', async () => {
      const runner = new FakeRunner({
        destroy: () => ({ exitCode: 1, stdout: '', stderr: 'Error: instance is locked' }),
      });
      const subject = orchestrator(runner, false);
      await subject.apply({ provider: 'aws', workspace: 'vm-1', variables: {} });

      await expect(subject.destroy({ workspace: 'vm-1' })).rejects.toThrow('Error: instance is locked');
      expect(await workspaces.exists('vm-1')).toBe(true);
      expect(events.list({ eventType: 'provision_destroy' })[0].status).toBe('failed');
    });
  });

  describe('with a terraform binary', () => {
    function fakeTerraform(body: string, timeoutMs = 10_000): ProcessExecutor {
      const binary = join(tempDir, 'terraform');
      writeFileSync(binary, `#!/bin/sh\n${body}\n`);
      chmodSync(binary, 0o755);
      return new ProcessExecutor({ binary, timeoutMs, killGraceMs: 500 });
    }

    it('applies and destroys end to end', async () => {
      const executor = fakeTerraform(
        [
          'case "$1" in',
          '  init) echo "Terraform has been successfully initialized!" ;;',
          '  apply)',
          '    echo "aws_instance.vm: Creation complete after 1s [id=i-0feed]"',
          '    echo',
          '    echo "Outputs:"',
          '    echo',
          '    echo "instance_id = \\"i-0feed\\""',
          '    echo "public_ip = \\"203.0.113.7\\""',
          '    ;;',
          '  destroy) echo "aws_instance.vm: Destruction complete after 1s" ;;',
          'esac',
        ].join('\n')
      );
      const subject = orchestrator(executor);

      const facts = await subject.apply({ provider: 'aws', workspace: 'vm-1', variables: { name: 'web' } });
      const ack = await subject.destroy({ workspace: 'vm-1' });

      expect(facts.instanceId).toBe('i-0feed');
      expect(facts.publicIp).toBe('203.0.113.7');
      expect(ack.destroyedResources).toEqual(['aws_instance.vm']);
      expect(events.list().map((event) => [event.eventType, event.status])).toEqual([
        ['provision_destroy', 'success'],
        ['provision_apply', 'success'],
      ]);
    });

    it('marks the event failed when the tool outlives its timeout', async () => {
      const executor = fakeTerraform('[ "$1" = init ] && exit 0\nexec sleep 30', 200);
      const startedAt = Date.now();

      await expect(
        orchestrator(executor).apply({ provider: 'aws', workspace: 'vm-1', variables: {} })
      ).rejects.toBeInstanceOf(TimeoutError);

      expect(Date.now() - startedAt).toBeLessThan(5_000);
      const [event] = events.list();
      expect(event.status).toBe('failed');
      expect(event.errorMessage).toBe('terraform apply timed out after 200ms');
    });

    it('stops a running apply when cancelled and keeps the attempt', async () => {
      const executor = fakeTerraform('[ "$1" = init ] && exit 0\nsleep 30');
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 300);
      const startedAt = Date.now();

      const error = await orchestrator(executor)
        .apply({ provider: 'aws', workspace: 'vm-1', variables: {}, signal: controller.signal })
        .catch((caught: unknown) => caught);

      expect(Date.now() - startedAt).toBeLessThan(3_000);
      expect(error).toBeInstanceOf(CancelledError);
      expect(error instanceof CancelledError && error.command).toBe('apply');
      expect(error instanceof CancelledError && error.started).toBe(true);
      const [event] = events.list();
      expect(event.status).toBe('failed');
      expect(event.errorMessage).toBe('terraform apply was cancelled');
      expect(await workspaces.exists('vm-1')).toBe(true);
    });
  });
});

describe('toTerraformEnv', () => {
  it('prefixes names and encodes non-string values as JSON', () => {
    expect(
      toTerraformEnv({ name: 'web', security_group_ids: ['sg-1'], port: 22 }, { secret_key: 'test-secret' })
    ).toEqual({
      TF_VAR_name: 'web',
      TF_VAR_security_group_ids: '["sg-1"]',
      TF_VAR_port: '22',
      TF_VAR_secret_key: 'test-secret',
    });
  });
});
