import { z } from "zod";
import {
  SERIAL_PORT_ATTRIBUTES,
  isNumericAttribute,
  type SerialPortCriteria,
  type SerialPortDescriptor,
} from "../device/types.js";
import { ValidationError } from "../utils/errors.js";

const USB_ID_PATTERN = /^(?:0x)?([0-9a-f]{1,4})$/i;

const text = z.string().nullable();
const usbId = z
  .number()
  .int("USB IDs must be integers")
  .min(0, "USB IDs must be between 0x0000 and 0xFFFF")
  .max(0xffff, "USB IDs must be between 0x0000 and 0xFFFF")
  .nullable();

/**
 * One validator per descriptor attribute. `path` and `name` are always
 * present on a descriptor, so `null` can never match them.
 */
export const criteriaShape = {
  path: z.string(),
  name: z.string(),
  description: text,
  hwid: text,
  vendorId: usbId,
  productId: usbId,
  serialNumber: text,
  location: text,
  manufacturer: text,
  product: text,
  interface: text,
  pnpId: text,
  subsystem: text,
  devicePath: text,
  usbDevicePath: text,
  usbInterfacePath: text,
};

// Unknown keys are rejected rather than silently never matching
export const criteriaSchema = z.object(criteriaShape).partial().strict();

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Check untrusted criteria against the known attribute names and types
 */
export function validateCriteria(input: unknown): SerialPortCriteria {
  const result = criteriaSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid serial port criteria: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Parse a hexadecimal USB vendor/product ID ("2341", "0x2341")
 */
export function parseUsbId(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = USB_ID_PATTERN.exec(value.trim());
  return match ? parseInt(match[1], 16) : null;
}

export function formatUsbId(id: number): string {
  return id.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * True when every supplied criterion equals the port's attribute exactly
 */
export function matchesCriteria(
  port: SerialPortDescriptor,
  criteria: SerialPortCriteria,
): boolean {
  for (const attribute of SERIAL_PORT_ATTRIBUTES) {
    const expected = criteria[attribute];
    if (expected !== undefined && port[attribute] !== expected) {
      return false;
    }
  }
  return true;
}

/**
 * Render criteria for messages, e.g. `vendorId=0x2341, product="Uno"`
 */
export function describeCriteria(criteria: SerialPortCriteria): string {
  const parts = SERIAL_PORT_ATTRIBUTES.flatMap((attribute) => {
    const value = criteria[attribute];
    if (value === undefined) return [];
    const rendered =
      isNumericAttribute(attribute) && typeof value === "number"
        ? `0x${formatUsbId(value)}`
        : JSON.stringify(value);
    return [`${attribute}=${rendered}`];
  });

  return parts.length > 0 ? parts.join(", ") : "any criteria";
}
