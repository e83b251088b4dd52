/**
 * Execution environments.
 *
 * An environment is the isolated place where an agent CLI is installed and
 * run. The harness owns its lifecycle; agents only exec commands in it and
 * move files across its boundary.
 */

import { spawn } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import { posix } from 'node:path';

import { shellQuote } from './shell';
import type { ExecOptions, ExecResult } from './types';

/** Exit status reported for commands killed by the timeout, matching coreutils `timeout`. */
export const TIMEOUT_RETURN_CODE = 124;

export interface ExecutionEnvironment {
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;
  uploadFile(sourcePath: string, targetPath: string): Promise<void>;
  /** Copy the contents of `sourceDir` (inside the environment) into `targetDir` on the host. */
  downloadDir(sourceDir: string, targetDir: string): Promise<void>;
}

/**
 * Run a process to completion, collecting its output. A timeout kills the
 * process and reports TIMEOUT_RETURN_CODE.
 */
export function runProcess(
  command: string,
  args: string[],
  timeoutSec?: number
): Promise<ExecResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const timer =
      timeoutSec !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, timeoutSec * 1000)
        : undefined;

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err: Error) => {
      if (timer) clearTimeout(timer);
      resolve({ stdout, stderr: `${stderr}failed to spawn "${command}": ${err.message}\n`, returnCode: 127 });
    });

    child.on('close', (code: number | null) => {
      if (timer) clearTimeout(timer);
      resolve({ stdout, stderr, returnCode: timedOut ? TIMEOUT_RETURN_CODE : code ?? 1 });
    });
  });
}

export interface DockerEnvironmentOptions {
  /** Container name or id; must already be running. */
  container: string;
  /** Docker executable (default: "docker"). */
  dockerPath?: string;
}

/** Environment backed by a running Docker container, driven through the docker CLI. */
export class DockerEnvironment implements ExecutionEnvironment {
  private readonly container: string;
  private readonly docker: string;

  constructor(options: DockerEnvironmentOptions) {
    this.container = options.container;
    this.docker = options.dockerPath ?? 'docker';
  }

  async exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const args = ['exec'];
    if (options.cwd) args.push('-w', options.cwd);
    for (const [key, value] of Object.entries(options.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(this.container, 'bash', '-lc', command);
    return runProcess(this.docker, args, options.timeoutSec);
  }

  async uploadFile(sourcePath: string, targetPath: string): Promise<void> {
    const parent = posix.dirname(targetPath);
    const mk = await this.exec(`mkdir -p ${shellQuote(parent)}`);
    if (mk.returnCode !== 0) {
      throw new Error(`could not create ${parent} in ${this.container}: ${mk.stderr.trim()}`);
    }

    const cp = await runProcess(this.docker, ['cp', sourcePath, `${this.container}:${targetPath}`]);
    if (cp.returnCode !== 0) {
      throw new Error(`docker cp ${sourcePath} failed (exit ${cp.returnCode}): ${cp.stderr.trim()}`);
    }
  }

  async downloadDir(sourceDir: string, targetDir: string): Promise<void> {
    await mkdir(targetDir, { recursive: true });
    const source = `${this.container}:${sourceDir.replace(/\/$/, '')}/.`;
    const cp = await runProcess(this.docker, ['cp', source, targetDir]);
    if (cp.returnCode !== 0) {
      throw new Error(`docker cp ${source} failed (exit ${cp.returnCode}): ${cp.stderr.trim()}`);
    }
  }
}
