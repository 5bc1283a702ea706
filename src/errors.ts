// Errors that reach a Fastify handler carry `statusCode`; Fastify maps it onto the reply.

export class SettingsValidationError extends Error {
  readonly statusCode = 400;

  constructor(readonly issues: string[]) {
    super(`Validation failed: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
  }
}

export class PersistenceError extends Error {
  readonly statusCode = 500;

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to write ${filePath}: ${describeError(options?.cause)}`, options);
    this.name = 'PersistenceError';
  }
}

export class SourceFetchError extends Error {
  constructor(
    readonly url: string,
    readonly reason: string
  ) {
    super(`${url}: ${reason}`);
    this.name = 'SourceFetchError';
  }
}

export class CustomConfigMissingError extends Error {
  readonly statusCode = 409;

  constructor(readonly filePath: string) {
    super(`Custom config enabled but ${filePath} not found`);
    this.name = 'CustomConfigMissingError';
  }
}

export class ControlCommandError extends Error {
  readonly statusCode = 500;

  constructor(
    readonly command: string,
    readonly output: string
  ) {
    super(`${command} failed${output ? `: ${output}` : ''}`);
    this.name = 'ControlCommandError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
