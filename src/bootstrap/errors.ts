/**
 * Error taxonomy for the bootstrap run
 */

export type BootstrapErrorCode =
  | "InvalidChoice"
  | "ConfigInvalid"
  | "RuntimeUnavailable"
  | "ContainerStartFailed"
  | "DatabaseNotReady"
  | "MigrationFailed"
  | "ApplicationStartFailed";

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;

  constructor(code: BootstrapErrorCode, message: string) {
    super(message);
    this.name = "BootstrapError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
