import { spawn, type ChildProcess } from 'child_process';
import type { Logger } from 'pino';
import { CancelledError, ProvisioningFailedError, TimeoutError, errorMessage } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import type {
  CommandResult,
  ICommandRunner,
  RunOptions,
  TerraformCommand,
} from '../../domain/ports/provisioning.port.js';

export interface ProcessExecutorOptions {
  binary: string;
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL when a run is stopped */
  killGraceMs: number;
}

const UNATTENDED = ['-input=false', '-no-color'];

export const COMMAND_ARGS: Record<TerraformCommand, readonly string[]> = {
  init: ['init', ...UNATTENDED],
  plan: ['plan', ...UNATTENDED],
  apply: ['apply', '-auto-approve', ...UNATTENDED],
  destroy: ['destroy', '-auto-approve', ...UNATTENDED],
};

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/**
 * Runs the provisioning tool as a child process. The call settles only after
 * the child has exited, including when it is stopped for a timeout or an abort.
 * Each run gets its own process group so that stopping it also reaches the
 * provider plugins the tool starts.
 */
export class ProcessExecutor implements ICommandRunner {
  private readonly log: Logger;

  constructor(
    private readonly options: ProcessExecutorOptions,
    log: Logger = createComponentLogger('executor')
  ) {
    this.log = log;
  }

  run(command: TerraformCommand, cwd: string, runOptions: RunOptions = {}): Promise<CommandResult> {
    const { signal } = runOptions;
    const timeoutMs = runOptions.timeoutMs ?? this.options.timeoutMs;

    if (signal?.aborted) {
      return Promise.reject(new CancelledError(command, false));
    }

    return new Promise((resolve, reject) => {
      const startedAt = Date.now();
      const child = spawn(this.options.binary, [...COMMAND_ARGS[command]], {
        cwd,
        env: { ...process.env, ...runOptions.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
      this.log.debug({ command, cwd, pid: child.pid }, 'Started terraform');

      let stdout = '';
      let stderr = '';
      let stopReason: 'timeout' | 'cancelled' | null = null;
      let settled = false;
      let killTimer: NodeJS.Timeout | null = null;

      const stop = (reason: 'timeout' | 'cancelled') => {
        if (stopReason) return;
        stopReason = reason;
        this.log.warn({ command, pid: child.pid, reason }, 'Stopping terraform');
        this.signalGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => {
          this.log.warn({ command, pid: child.pid }, 'Terraform ignored SIGTERM, sending SIGKILL');
          this.signalGroup(child, 'SIGKILL');
        }, this.options.killGraceMs);
      };

      const timer = setTimeout(() => stop('timeout'), timeoutMs);
      const onAbort = () => stop('cancelled');
      signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        if (settled) return;
        cleanup();
        reject(new ProvisioningFailedError(`Failed to run ${this.options.binary} ${command}: ${error.message}`, stderr || null));
      });

      child.on('close', (code, exitSignal) => {
        if (settled) return;
        cleanup();
        const durationMs = Date.now() - startedAt;

        if (stopReason === 'timeout') {
          reject(new TimeoutError(command, timeoutMs, stderr || null));
          return;
        }
        if (stopReason === 'cancelled') {
          reject(new CancelledError(command, true, stderr || null));
          return;
        }

        const exitCode = code ?? 1;
        this.log.info({ command, exitCode, signal: exitSignal, durationMs }, 'Terraform exited');
        resolve({ exitCode, stdout, stderr });
      });
    });
  }

  private signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid === undefined) return;
    try {
      process.kill(-child.pid, signal);
    } catch (error) {
      if (isMissingProcess(error)) return;
      this.log.warn({ pid: child.pid, signal, err: errorMessage(error) }, 'Could not signal process group');
      child.kill(signal);
    }
  }
}
