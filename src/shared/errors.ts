export enum BootstrapErrorCode {
  /** Command resolution or another probing mechanism is unusable. */
  ENVIRONMENT = "ENVIRONMENT",
  TOOLCHAIN_INSTALL = "TOOLCHAIN_INSTALL",
  BUILD = "BUILD",
  /** Elevation was denied or is unavailable. */
  PERMISSION = "PERMISSION",
  INSTALL = "INSTALL",
}

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly context?: Record<string, unknown>;
  /** Extra guidance printed under the error line. */
  readonly hint?: string;

  constructor(
    code: BootstrapErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; hint?: string },
  ) {
    super(message);
    this.name = "BootstrapError";
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }
}

export function isBootstrapError(err: unknown): err is BootstrapError {
  return err instanceof BootstrapError;
}

type ErrorOptions = { context?: Record<string, unknown>; hint?: string };

export function environmentError(message: string, options?: ErrorOptions): BootstrapError {
  return new BootstrapError(BootstrapErrorCode.ENVIRONMENT, message, options);
}

export function toolchainInstallError(message: string, options?: ErrorOptions): BootstrapError {
  return new BootstrapError(BootstrapErrorCode.TOOLCHAIN_INSTALL, message, options);
}

export function buildError(message: string, options?: ErrorOptions): BootstrapError {
  return new BootstrapError(BootstrapErrorCode.BUILD, message, options);
}

export function permissionError(message: string, options?: ErrorOptions): BootstrapError {
  return new BootstrapError(BootstrapErrorCode.PERMISSION, message, options);
}

export function installError(message: string, options?: ErrorOptions): BootstrapError {
  return new BootstrapError(BootstrapErrorCode.INSTALL, message, options);
}

/** Message of an arbitrary thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
