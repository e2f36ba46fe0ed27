// Error taxonomy for the orchestrator.
// Validation, discovery and registration errors abort a command. Per-item failures are
// recorded as JobResults, and classification problems degrade to `unknown`.

export abstract class TranscoderError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends TranscoderError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly issues: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
  }
}

export class DiscoveryError extends TranscoderError {
  readonly code = 'DISCOVERY_ERROR';

  constructor(
    readonly inputPath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot read input location ${inputPath}: ${reason}`, options);
  }
}

export class RegistrationError extends TranscoderError {
  readonly code = 'REGISTRATION_ERROR';
}

// The engine process could not be started at all (missing binary, bad path).
export class EngineError extends TranscoderError {
  readonly code = 'ENGINE_ERROR';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
