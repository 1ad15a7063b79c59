export type ErrorKind =
  | "DeviceError"
  | "EmptyCaptureError"
  | "NetworkError"
  | "AuthError"
  | "ServiceError"
  | "CorruptLedgerError"
  | "StorageError"
  | "ConfigError";

export class VoiceLedgerError extends Error {
  constructor(readonly kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
  }
}

export class DeviceError extends VoiceLedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super("DeviceError", message, options);
  }
}

export class EmptyCaptureError extends VoiceLedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super("EmptyCaptureError", message, options);
  }
}

export class NetworkError extends VoiceLedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super("NetworkError", message, options);
  }
}

export class AuthError extends VoiceLedgerError {
  constructor(message: string, readonly statusCode?: number, options?: ErrorOptions) {
    super("AuthError", message, options);
  }
}

export class ServiceError extends VoiceLedgerError {
  constructor(
    message: string,
    readonly statusCode: number | undefined,
    readonly body = "",
    options?: ErrorOptions
  ) {
    super("ServiceError", message, options);
  }
}

export class CorruptLedgerError extends VoiceLedgerError {
  constructor(readonly filePath: string, message: string, options?: ErrorOptions) {
    super("CorruptLedgerError", message, options);
  }
}

/** Local file writes failed for a reason other than corrupt ledger content. */
export class StorageError extends VoiceLedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super("StorageError", message, options);
  }
}

export class ConfigError extends VoiceLedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super("ConfigError", message, options);
  }
}

export type ErrorFactory = (message: string, cause: unknown) => VoiceLedgerError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toVoiceLedgerError(error: unknown, fallback: ErrorFactory): VoiceLedgerError {
  if (error instanceof VoiceLedgerError) {
    return error;
  }
  return fallback(describeError(error), error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
