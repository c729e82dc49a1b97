/**
 * Error types raised by the discoverer.
 *
 * Expected absences (no port, no matching network, monitoring service
 * missing) are never errors; they are logged and skipped. Only
 * collaborator failures and bad configuration surface here.
 */

export class SwarmSdError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The Docker API failed or returned a payload we cannot read. Fatal to a pass. */
export class OrchestratorError extends SwarmSdError {}

/** The target file could not be written. Fatal to a pass. */
export class TargetWriteError extends SwarmSdError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Failed to write target file "${path}"`, options);
    this.path = path;
  }
}

/** Invalid CLI flag or environment variable */
export class ConfigError extends SwarmSdError {}

/** Message of an unknown thrown value, for logs and status output */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
