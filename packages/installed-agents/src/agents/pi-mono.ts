/**
 * pi-coding-agent agent.
 *
 * Installs the `pi` CLI from npm (or from a prebuilt bundle) and runs one
 * message per task. In json mode pi streams events that carry real token
 * usage; see usage/pi-transcript.ts.
 */

import { join } from 'node:path';

import { AGENT_LOGS_DIR, BaseInstalledAgent, WORKSPACE_DIR, type BaseAgentParams } from '../base';
import {
  PI_PROVIDERS,
  PiMonoOptionsSchema,
  parseAgentOptions,
  resolvePiModelConfig,
  type OutputMode,
  type PiMonoOptions,
} from '../config';
import { envOrUndefined, firstPresent, forwardEnv } from '../env';
import type { ExecutionEnvironment } from '../environment';
import { fileExists, firstExisting } from '../files';
import type { TemplateVariables } from '../template';
import { shellQuote } from '../shell';
import type { AgentName, ExecInput, Provider, UsageExtraction } from '../types';
import { extractPiUsage } from '../usage/pi-transcript';

/** API key variables per provider, in order of preference. */
export const PI_API_KEYS: Record<Provider, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY', 'ANTHROPIC_OAUTH_TOKEN'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY'],
  groq: ['GROQ_API_KEY'],
  cerebras: ['CEREBRAS_API_KEY'],
  xai: ['XAI_API_KEY'],
  openrouter: ['OPENROUTER_API_KEY'],
};

/** Keys always passed through when present. */
const COMMON_API_KEYS = ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY', 'GEMINI_API_KEY'];

/** OpenAI org/project context needed for gated models such as gpt-5.1-codex. */
const OPENAI_CONTEXT_KEYS = [
  'OPENAI_USER_EMAIL',
  'OPENAI_ORG',
  'OPENAI_ORG_ID',
  'OPENAI_PROJECT',
  'OPENAI_PROJECT_ID',
  'OPENAI_API_BASE',
];

export const PI_OUTPUT_LOG = `${AGENT_LOGS_DIR}/pi_output.log`;
export const PI_RESULTS_FILE = `${AGENT_LOGS_DIR}/results.json`;
export const PI_BUNDLE_TARGET = '/tmp/pi-bundle.tgz';
export const PI_SESSION_COMPLETE = '=== Pi-Mono Session Complete ===';

/** Exits non-zero unless stdin is one JSON document. */
const JSON_CHECK = `node -e 'JSON.parse(require("fs").readFileSync(0, "utf8"))'`;

export interface PiMonoAgentParams extends BaseAgentParams {
  options?: PiMonoOptions;
}

export class PiMonoAgent extends BaseInstalledAgent {
  protected readonly installTemplateName = 'install-pi-mono.sh';

  readonly provider: Provider;
  readonly piModel: string | null;
  readonly outputMode: OutputMode;
  readonly noSession: boolean;
  readonly timeoutSeconds: number;
  readonly bundlePath: string;
  private readonly piVersion: string | undefined;

  constructor(params: PiMonoAgentParams) {
    super(params);
    const options = parseAgentOptions(PiMonoOptionsSchema, params.options, 'pi-mono');

    const resolved = resolvePiModelConfig({
      modelName: params.modelName,
      provider: options.provider,
      piModel: options.piModel,
      logger: this.logger,
    });

    this.provider = resolved.provider;
    this.piModel = resolved.piModel;
    this.outputMode = options.outputMode;
    this.noSession = options.noSession;
    this.timeoutSeconds = options.timeoutSeconds;
    this.piVersion = options.piVersion;
    this.bundlePath = options.bundlePath ?? join(this.templatesDir, 'pi-bundle.tgz');
  }

  name(): AgentName {
    return 'pi-mono';
  }

  protected templateVariables(): TemplateVariables {
    return {
      ...super.templateVariables(),
      provider: PI_PROVIDERS[this.provider],
      pi_model: this.piModel ?? '',
      pi_version: this.piVersion ?? '',
    };
  }

  /** Uploads a prebuilt pi bundle first when one exists, so install skips the registry. */
  async setup(environment: ExecutionEnvironment): Promise<void> {
    if (await fileExists(this.bundlePath)) {
      this.logger.debug?.(`Found prebuilt pi bundle at ${this.bundlePath}, uploading for fast install`);
      await environment.uploadFile(this.bundlePath, PI_BUNDLE_TARGET);
    }
    await super.setup(environment);
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  private buildEnv(): Record<string, string> | undefined {
    const vars: Record<string, string> = {};

    const key = firstPresent(this.env, PI_API_KEYS[this.provider]);
    if (key) vars[key[0]] = key[1];

    forwardEnv(this.env, COMMON_API_KEYS, vars);
    forwardEnv(this.env, OPENAI_CONTEXT_KEYS, vars);

    return envOrUndefined(vars);
  }

  createRunAgentCommands(instruction: string): ExecInput[] {
    this.recordInstruction(instruction);
    const env = this.buildEnv();

    const parts = ['pi', '--provider', PI_PROVIDERS[this.provider]];
    if (this.piModel) parts.push('--model', shellQuote(this.piModel));
    parts.push('--mode', this.outputMode);
    if (this.noSession) parts.push('--no-session');
    parts.push(shellQuote(instruction));

    const commands: ExecInput[] = [
      {
        command: `mkdir -p ${AGENT_LOGS_DIR}/pi_session`,
        env,
        cwd: WORKSPACE_DIR,
      },
      {
        command:
          `cd ${WORKSPACE_DIR} && timeout ${this.timeoutSeconds} ${parts.join(' ')} ` +
          `2>&1 | tee ${PI_OUTPUT_LOG}`,
        env,
        cwd: WORKSPACE_DIR,
        timeoutSec: this.timeoutSeconds + 60,
      },
    ];

    if (this.outputMode === 'json') {
      // The final event line holds the completed session state. It is saved only
      // if it parses; node is present because the install script requires it.
      commands.push({
        command: [
          `if [ -f ${PI_OUTPUT_LOG} ]; then`,
          "echo '=== Extracting JSON results ===';",
          `last=$(grep '^[[:space:]]*{' ${PI_OUTPUT_LOG} | tail -n 1);`,
          `if [ -n "$last" ] && printf '%s' "$last" | ${JSON_CHECK} >/dev/null 2>&1; then`,
          `printf '%s\\n' "$last" > ${PI_RESULTS_FILE} && echo 'Results saved to results.json';`,
          "else echo 'Could not parse JSON output';",
          'fi;',
          'fi',
        ].join(' '),
        env,
        cwd: WORKSPACE_DIR,
      });
    }

    commands.push({
      command: `echo '${PI_SESSION_COMPLETE}' && ls -la ${WORKSPACE_DIR} && git status 2>/dev/null || true`,
      env,
      cwd: WORKSPACE_DIR,
    });

    return commands;
  }

  // -------------------------------------------------------------------------
  // Post-run
  // -------------------------------------------------------------------------

  protected async extractUsage(): Promise<UsageExtraction> {
    this.logger.info('Parsing results from pi-coding-agent');
    const outputFile = await firstExisting([
      join(this.logsDir, 'pi_output.log'),
      join(this.logsDir, 'command-1', 'pi_output.log'),
    ]);

    return extractPiUsage(outputFile, {
      provider: this.provider,
      model: this.piModel,
      outputMode: this.outputMode,
      noSession: this.noSession,
      logger: this.logger,
    });
  }
}
