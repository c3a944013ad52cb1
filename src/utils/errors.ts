import type { SerialPortCriteria } from "../device/types.js";

export type SerialFinderErrorCode =
  | "NO_SUCH_PORT"
  | "MULTIPLE_PORTS"
  | "INVALID_CRITERIA"
  | "CONFIG";

/**
 * Base class for every error this package raises itself.
 * Enumeration failures from the OS are passed through untouched.
 */
export class SerialFinderError extends Error {
  readonly code: SerialFinderErrorCode;

  constructor(message: string, code: SerialFinderErrorCode) {
    super(message);
    this.name = "SerialFinderError";
    this.code = code;
  }
}

/**
 * No attached port matched the criteria, or no port exists at the given path.
 */
export class NoSuchSerialPortError extends SerialFinderError {
  readonly criteria?: SerialPortCriteria;
  readonly path?: string;

  constructor(
    message: string,
    options?: { criteria?: SerialPortCriteria; path?: string },
  ) {
    super(message, "NO_SUCH_PORT");
    this.name = "NoSuchSerialPortError";
    this.criteria = options?.criteria;
    this.path = options?.path;
  }
}

/**
 * More than one attached port matched the criteria.
 */
export class MultipleSerialPortsError extends SerialFinderError {
  readonly paths: readonly string[];
  readonly criteria: SerialPortCriteria;

  constructor(
    message: string,
    paths: readonly string[],
    criteria: SerialPortCriteria,
  ) {
    super(message, "MULTIPLE_PORTS");
    this.name = "MultipleSerialPortsError";
    this.paths = paths;
    this.criteria = criteria;
  }
}

export class ValidationError extends SerialFinderError {
  constructor(message: string) {
    super(message, "INVALID_CRITERIA");
    this.name = "ValidationError";
  }
}

export class ConfigError extends SerialFinderError {
  constructor(message: string) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}
