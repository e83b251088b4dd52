/**
 * Installed agent lifecycle.
 *
 * An installed agent is a CLI tool put into the execution environment by a
 * rendered install script, then driven through a fixed list of shell
 * commands. The lifecycle is:
 *
 *   1. setup()  : render + upload + run the install script
 *   2. run()    : execute createRunAgentCommands() in order, logging each
 *                 command under <logsDir>/command-<n>/
 *   3. populateContextPostRun(): read the transcript and fill the usage record
 *
 * Commands never pass data to each other; each writes to a fixed log path
 * under /logs/agent that is copied back into logsDir after the run.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { readAgentEnv, type AgentEnv } from './env';
import type { ExecutionEnvironment } from './environment';
import { AgentSetupError } from './errors';
import { errorMessage } from './files';
import { silentLogger } from './logger';
import { renderTemplateFile, type TemplateVariables } from './template';
import type { AgentContext, AgentName, ExecInput, ExecResult, Logger, UsageExtraction } from './types';

/** Directory inside the environment where agents write their logs. */
export const AGENT_LOGS_DIR = '/logs/agent';
/** Task working directory inside the environment. */
export const WORKSPACE_DIR = '/workspace';
/** Where the rendered install script is placed inside the environment. */
export const INSTALL_DIR = '/installed-agent';

/** Install templates shipped with this package. */
export const DEFAULT_TEMPLATES_DIR = resolve(__dirname, '..', 'templates');

export interface BaseAgentParams {
  /** Host directory receiving command logs and the copied agent logs. */
  logsDir: string;
  /** Model in "provider/model" form, as given by the harness. */
  modelName?: string;
  /** Environment snapshot consulted for API keys; defaults to an empty one. */
  env?: AgentEnv;
  logger?: Logger;
  templatesDir?: string;
}

export abstract class BaseInstalledAgent {
  protected readonly logsDir: string;
  protected readonly modelName?: string;
  protected readonly env: AgentEnv;
  protected readonly logger: Logger;
  protected readonly templatesDir: string;

  /** Instruction of the most recent command build, kept for post-run estimates. */
  protected lastInstruction: string | null = null;

  constructor(params: BaseAgentParams) {
    this.logsDir = params.logsDir;
    this.modelName = params.modelName;
    this.env = params.env ?? readAgentEnv({});
    this.logger = params.logger ?? silentLogger;
    this.templatesDir = params.templatesDir ?? DEFAULT_TEMPLATES_DIR;
  }

  abstract name(): AgentName;

  version(): string {
    return '1.0.0';
  }

  /** File name of the install template inside templatesDir. */
  protected abstract readonly installTemplateName: string;

  get installTemplatePath(): string {
    return join(this.templatesDir, this.installTemplateName);
  }

  protected templateVariables(): TemplateVariables {
    return { version: this.version() };
  }

  /** Build the ordered commands for one task. */
  abstract createRunAgentCommands(instruction: string): ExecInput[];

  /** Read this agent's transcript from logsDir. Never throws. */
  protected abstract extractUsage(): Promise<UsageExtraction>;

  /** Remember the instruction a transcript belongs to, when it was built elsewhere. */
  recordInstruction(instruction: string): void {
    this.lastInstruction = instruction;
  }

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  async setup(environment: ExecutionEnvironment): Promise<void> {
    await environment.exec(`mkdir -p ${INSTALL_DIR}`);

    const script = await renderTemplateFile(this.installTemplatePath, this.templateVariables());
    const scratch = await mkdtemp(join(tmpdir(), `${this.name()}-install-`));
    try {
      const scriptPath = join(scratch, 'install.sh');
      await writeFile(scriptPath, script, { encoding: 'utf8', mode: 0o755 });
      await environment.uploadFile(scriptPath, `${INSTALL_DIR}/install.sh`);
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }

    this.logger.info(`${this.name()}: running install script`);
    const result = await environment.exec(`bash ${INSTALL_DIR}/install.sh`);
    await this.writeCommandLog('setup', `bash ${INSTALL_DIR}/install.sh`, result);

    if (result.returnCode !== 0) {
      throw new AgentSetupError(
        `${this.name()} install script exited with ${result.returnCode}`,
        result.returnCode,
        result.stdout
      );
    }
  }

  // -------------------------------------------------------------------------
  // Run
  // -------------------------------------------------------------------------

  async run(
    instruction: string,
    environment: ExecutionEnvironment,
    context: AgentContext
  ): Promise<AgentContext> {
    const commands = this.createRunAgentCommands(instruction);

    for (const [i, input] of commands.entries()) {
      this.logger.debug?.(`${this.name()}: command-${i}: ${input.command}`);
      const result = await environment.exec(input.command, {
        cwd: input.cwd,
        env: input.env,
        timeoutSec: input.timeoutSec,
      });
      await this.writeCommandLog(`command-${i}`, input.command, result);
    }

    try {
      await environment.downloadDir(AGENT_LOGS_DIR, this.logsDir);
    } catch (err) {
      this.logger.warn(`${this.name()}: could not copy ${AGENT_LOGS_DIR}: ${errorMessage(err)}`);
    }

    await this.populateContextPostRun(context);
    return context;
  }

  /** Fill `context` from the transcript and report how the figures were obtained. */
  async populateContextPostRun(context: AgentContext): Promise<UsageExtraction> {
    const extraction = await this.extractUsage();
    Object.assign(context, extraction.context);
    return extraction;
  }

  private async writeCommandLog(dirName: string, command: string, result: ExecResult): Promise<void> {
    const dir = join(this.logsDir, dirName);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'command.txt'), command, 'utf8');
    await writeFile(join(dir, 'stdout.txt'), result.stdout, 'utf8');
    await writeFile(join(dir, 'return-code.txt'), String(result.returnCode), 'utf8');
    if (result.stderr) {
      await writeFile(join(dir, 'stderr.txt'), result.stderr, 'utf8');
    }
  }
}
