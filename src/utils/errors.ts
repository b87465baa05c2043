/**
 * Error codes double as process exit codes, so every value stays below 256.
 */
export enum ErrorCode {
  // Invocation errors
  INTERFACE_NOT_SUPPLIED = 1,
  TOO_MANY_PARAMETERS = 2,

  // Selection errors
  PATTERN_NOT_FOUND = 3,
  INVALID_INTERFACE_NAME = 4,

  // Interface mutation errors
  INTERFACE_DOWN_FAILED = 5,
  ADDRESS_APPLY_FAILED = 6,

  // Data errors
  REGISTRY_NOT_FOUND = 7,

  INTERFACE_UP_FAILED = 8,
  RECORD_NOT_FOUND = 9,
  CONFIG_INVALID = 10,

  // General errors
  UNKNOWN_ERROR = 99,
  OPERATION_CANCELLED = 130,
}

export interface InterfaceState {
  addressChanged: boolean;
  interfaceUp: boolean;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
}

export class VendorMacError extends Error {
  readonly code: ErrorCode;
  readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error | undefined;
      context?: Record<string, unknown> | undefined;
    }
  ) {
    super(message);
    this.name = 'VendorMacError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, VendorMacError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
    };
  }

  static fromError(err: Error, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): VendorMacError {
    if (err instanceof VendorMacError) return err;
    return new VendorMacError(code, err.message, { cause: err });
  }
}

/** Bad arguments, unknown interface or empty search result. Raised before any interface mutation. */
export class InvocationError extends VendorMacError {
  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(code, message, options);
    this.name = 'InvocationError';
  }
}

export class SelectionError extends VendorMacError {
  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(code, message, options);
    this.name = 'SelectionError';
  }
}

export class ConfigurationError extends VendorMacError {
  constructor(
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(ErrorCode.CONFIG_INVALID, message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised after the interface may already have been touched. `interfaceState`
 * says what the operator has to fix by hand; nothing is rolled back.
 */
export class InterfaceMutationError extends VendorMacError {
  readonly interfaceName: string;
  readonly interfaceState: InterfaceState;

  constructor(
    code: ErrorCode,
    message: string,
    interfaceName: string,
    interfaceState: InterfaceState,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(code, message, {
      ...options,
      context: { ...options?.context, interfaceName, ...interfaceState },
    });
    this.name = 'InterfaceMutationError';
    this.interfaceName = interfaceName;
    this.interfaceState = interfaceState;
  }

  describeState(): string {
    const { addressChanged, interfaceUp } = this.interfaceState;
    if (!addressChanged && interfaceUp) {
      return 'mac address was not changed';
    }
    if (!addressChanged) {
      return `mac address was not changed, interface ${this.interfaceName} is down`;
    }
    if (!interfaceUp) {
      return `mac address was changed, interface ${this.interfaceName} is still down`;
    }
    return 'mac address was changed';
  }
}

export class OperationCancelledError extends VendorMacError {
  constructor(operation: string, options?: { cause?: Error | undefined }) {
    super(ErrorCode.OPERATION_CANCELLED, `Operation '${operation}' was cancelled`, options);
    this.name = 'OperationCancelledError';
  }
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof VendorMacError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

export function getExitCode(error: unknown): number {
  return getErrorCode(error);
}

/** Human-readable line describing what happened to the interface. */
export function describeInterfaceState(error: unknown): string {
  if (error instanceof InterfaceMutationError) {
    return error.describeState();
  }
  return 'mac address was not changed';
}
