import {
  MultipleSerialPortsError,
  NoSuchSerialPortError,
  SerialFinderError,
} from "../utils/errors.js";

/**
 * Turn a failure into the lines shown to the user
 */
export function describeFailure(error: unknown, verbose = false): string[] {
  if (error instanceof NoSuchSerialPortError) {
    return [`Device not connected: ${error.message}`];
  }

  if (error instanceof MultipleSerialPortsError) {
    return [
      `Criteria too broad, found ${error.paths.length} devices:`,
      ...error.paths.map((path) => `  ${path}`),
    ];
  }

  if (error instanceof SerialFinderError) {
    return [error.message];
  }

  if (error instanceof Error) {
    return verbose && error.stack ? [error.message, error.stack] : [error.message];
  }

  return [String(error)];
}
