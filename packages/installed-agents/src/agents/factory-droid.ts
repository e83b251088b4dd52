/**
 * Factory Droid agent.
 *
 * Installs the Factory `droid` CLI and runs it headless with `droid exec`.
 *
 * Droid authenticates through a browser on first run, which a container
 * cannot do. setup() therefore copies the host's ~/.factory/{auth,settings,
 * config}.json into the container; run `droid` once on the host first.
 * FACTORY_AUTH_TOKEN / FACTORY_API_KEY are forwarded when set.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { AGENT_LOGS_DIR, BaseInstalledAgent, WORKSPACE_DIR, type BaseAgentParams } from '../base';
import {
  FactoryDroidOptionsSchema,
  parseAgentOptions,
  resolveDroidModel,
  type FactoryDroidOptions,
  type ReasoningEffort,
} from '../config';
import { envOrUndefined, forwardEnv, type AgentEnv } from '../env';
import type { ExecutionEnvironment } from '../environment';
import { errorMessage, fileExists, firstExisting } from '../files';
import { shellQuote } from '../shell';
import type { AgentName, ExecInput, UsageExtraction } from '../types';
import { DROID_SESSION_COMPLETE, extractDroidUsage } from '../usage/droid-output';

/** Host files copied into the container, most important first. */
export const FACTORY_FILES = ['auth.json', 'settings.json', 'config.json'] as const;
export const FACTORY_CONTAINER_HOME = '/root/.factory';

/** `${VAR}` placeholders in config.json filled from the environment. */
export const CONFIG_PLACEHOLDER_KEYS = ['OPENAI_API_KEY', 'OLLAMA_API_KEY'] as const;

const FORWARDED_KEYS = ['FACTORY_API_KEY', 'ANTHROPIC_API_KEY', 'OPENAI_API_KEY'] as const;

export const DROID_OUTPUT_LOG = `${AGENT_LOGS_DIR}/droid_output.log`;

/** Replace `${KEY}` markers with values from `env`; markers for absent keys stay. */
export function substitutePlaceholders(text: string, env: AgentEnv, keys: readonly string[]): string {
  let out = text;
  for (const key of keys) {
    const value = env[key];
    if (value) out = out.split(`\${${key}}`).join(value);
  }
  return out;
}

export interface FactoryDroidAgentParams extends BaseAgentParams {
  options?: FactoryDroidOptions;
}

export class FactoryDroidAgent extends BaseInstalledAgent {
  protected readonly installTemplateName = 'install-factory-droid.sh';

  readonly droidModel: string;
  readonly reasoningEffort: ReasoningEffort;
  readonly timeoutSeconds: number;
  readonly factoryHome: string;
  private readonly authToken: string | null;

  constructor(params: FactoryDroidAgentParams) {
    super(params);
    const options = parseAgentOptions(FactoryDroidOptionsSchema, params.options, 'factory-droid');

    this.droidModel = resolveDroidModel(params.modelName, options.droidModel);
    this.reasoningEffort = options.reasoningEffort;
    this.timeoutSeconds = options.timeoutSeconds;
    this.factoryHome = options.factoryHome ?? join(homedir(), '.factory');
    this.authToken = this.env.FACTORY_AUTH_TOKEN || null;
  }

  name(): AgentName {
    return 'factory-droid';
  }

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  async setup(environment: ExecutionEnvironment): Promise<void> {
    await super.setup(environment);
    await this.uploadFactoryFiles(environment);
  }

  private async uploadFactoryFiles(environment: ExecutionEnvironment): Promise<void> {
    if (!(await fileExists(this.factoryHome))) {
      this.logger.warn(
        `No .factory directory found on host at ${this.factoryHome}. ` +
          'Factory Droid will require manual authentication (not possible in containers).'
      );
      this.logger.info("To fix: run 'droid' on your host machine first to authenticate");
      return;
    }

    let uploaded = 0;
    let authUploaded = false;

    for (const filename of FACTORY_FILES) {
      const source = join(this.factoryHome, filename);
      if (!(await fileExists(source))) {
        this.logger.warn(`${filename} not found (skipping)`);
        continue;
      }

      this.logger.info(`Uploading ${filename}...`);
      const target = `${FACTORY_CONTAINER_HOME}/${filename}`;
      try {
        if (filename === 'config.json') {
          await this.uploadPatchedConfig(environment, source, target);
        } else {
          await environment.uploadFile(source, target);
        }
        uploaded++;
        if (filename === 'auth.json') authUploaded = true;
        this.logger.info(`${filename} uploaded`);
      } catch (err) {
        this.logger.error(`Failed to upload ${filename}: ${errorMessage(err)}`);
      }
    }

    if (uploaded === 0) {
      this.logger.warn(
        'No Factory configuration files found. Factory Droid may require manual authentication.'
      );
      return;
    }

    this.logger.info(`Uploaded ${uploaded}/${FACTORY_FILES.length} Factory configuration files`);
    if (authUploaded) {
      this.logger.info('Factory Droid should now work with authenticated session');
    }
  }

  /** Upload config.json with runtime API keys filled in, so custom models resolve. */
  private async uploadPatchedConfig(
    environment: ExecutionEnvironment,
    source: string,
    target: string
  ): Promise<void> {
    let scratch: string | null = null;
    let uploadPath = source;

    try {
      const raw = await readFile(source, 'utf8');
      const patched = substitutePlaceholders(raw, this.env, CONFIG_PLACEHOLDER_KEYS);
      scratch = await mkdtemp(join(tmpdir(), 'factory-config-'));
      uploadPath = join(scratch, 'config.json');
      await writeFile(uploadPath, patched, { encoding: 'utf8', mode: 0o600 });
    } catch (err) {
      this.logger.warn(`Failed to patch config.json with env keys: ${errorMessage(err)}`);
      uploadPath = source;
    }

    try {
      await environment.uploadFile(uploadPath, target);
    } finally {
      if (scratch) await rm(scratch, { recursive: true, force: true });
    }
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  createRunAgentCommands(instruction: string): ExecInput[] {
    this.recordInstruction(instruction);

    const vars = forwardEnv(this.env, FORWARDED_KEYS, {});
    if (this.authToken) vars.FACTORY_AUTH_TOKEN = this.authToken;
    const env = envOrUndefined(vars);

    const parts = ['droid', 'exec', '-m', shellQuote(this.droidModel)];
    if (this.reasoningEffort !== 'off') {
      parts.push('-r', this.reasoningEffort);
    }
    // --auto follows the reasoning effort; high when effort is off.
    const autoLevel = this.reasoningEffort !== 'off' ? this.reasoningEffort : 'high';
    parts.push('--auto', autoLevel, shellQuote(instruction));

    return [
      {
        command: `mkdir -p ${AGENT_LOGS_DIR}/droid_session`,
        env,
        cwd: WORKSPACE_DIR,
      },
      {
        command: [
          "echo 'Checking Factory Droid authentication...' &&",
          `if [ -f ${FACTORY_CONTAINER_HOME}/auth.json ]; then`,
          "  echo 'Auth file found';",
          'else',
          "  echo 'WARNING: No auth file found. Factory Droid may fail.';",
          "  echo 'To authenticate: run droid on host machine first, or set FACTORY_AUTH_TOKEN';",
          'fi',
        ].join(' '),
        env,
        cwd: WORKSPACE_DIR,
      },
      {
        command:
          `timeout ${this.timeoutSeconds} ${parts.join(' ')} ` +
          `2>&1 | tee ${DROID_OUTPUT_LOG} || ` +
          "echo 'Factory Droid failed - likely due to authentication requirements'",
        env,
        cwd: WORKSPACE_DIR,
        timeoutSec: this.timeoutSeconds + 60,
      },
      {
        command: `echo '${DROID_SESSION_COMPLETE}' && ls -la ${WORKSPACE_DIR} && git status 2>/dev/null || true`,
        env,
        cwd: WORKSPACE_DIR,
      },
    ];
  }

  // -------------------------------------------------------------------------
  // Post-run
  // -------------------------------------------------------------------------

  protected async extractUsage(): Promise<UsageExtraction> {
    this.logger.info('Parsing results from Factory Droid');
    const outputFile = await firstExisting([
      join(this.logsDir, 'droid_output.log'),
      join(this.logsDir, 'command-2', 'droid_output.log'),
    ]);

    return extractDroidUsage(outputFile, {
      droidModel: this.droidModel,
      reasoningEffort: this.reasoningEffort,
      instruction: this.lastInstruction,
      logsDir: this.logsDir,
      logger: this.logger,
    });
  }
}
