export class AgentConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'AgentConfigError';
  }
}

export class AgentSetupError extends Error {
  readonly code = 'SETUP_ERROR';

  constructor(
    message: string,
    public readonly returnCode: number,
    public readonly output: string
  ) {
    super(message);
    this.name = 'AgentSetupError';
  }
}

export class TemplateError extends Error {
  readonly code = 'TEMPLATE_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class CliUsageError extends Error {
  readonly code = 'USAGE_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
