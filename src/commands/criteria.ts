import { readCriteriaFile } from "../config/reader.js";
import {
  SERIAL_PORT_ATTRIBUTES,
  isNumericAttribute,
  isSerialPortAttribute,
  type SerialPortCriteria,
} from "../device/types.js";
import { parseUsbId, validateCriteria } from "../serial/criteria.js";
import { ValidationError } from "../utils/errors.js";

export interface CriteriaOptions {
  match?: string[];
  criteria?: string;
}

/**
 * Parse repeated `key=value` options (e.g. "vendorId=2341,serialNumber=ABC")
 * into criteria. USB IDs are read as hexadecimal; everything else verbatim.
 */
export function parseMatchList(entries: readonly string[]): SerialPortCriteria {
  const result: Record<string, string | number> = {};

  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      throw new ValidationError(
        `Invalid match "${entry}": expected <attribute>=<value>`,
      );
    }

    const key = entry.slice(0, separator).trim();
    const value = entry.slice(separator + 1);

    if (!isSerialPortAttribute(key)) {
      throw new ValidationError(
        `Unknown attribute "${key}". Known attributes: ${SERIAL_PORT_ATTRIBUTES.join(", ")}`,
      );
    }

    if (isNumericAttribute(key)) {
      const id = parseUsbId(value);
      if (id === null) {
        throw new ValidationError(
          `Invalid ${key} "${value}": expected a hexadecimal USB ID such as 2341 or 0x2341`,
        );
      }
      result[key] = id;
    } else {
      result[key] = value;
    }
  }

  return validateCriteria(result);
}

/**
 * Combine a criteria file with --match entries; --match wins
 */
export async function resolveCriteria(
  options: CriteriaOptions,
): Promise<SerialPortCriteria> {
  const fromFile = options.criteria ? await readCriteriaFile(options.criteria) : {};
  const fromMatch = parseMatchList(options.match ?? []);
  return { ...fromFile, ...fromMatch };
}

/**
 * commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
