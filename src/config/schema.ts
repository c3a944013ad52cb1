import { z } from "zod";
import { criteriaShape, parseUsbId } from "../serial/criteria.js";

const hexUsbId = z
  .string()
  .regex(/^0x[0-9a-f]{1,4}$/i, 'USB IDs given as strings must look like "0x2341"')
  .transform((value) => parseUsbId(value));

const fileUsbId = z.union([criteriaShape.vendorId, hexUsbId]);

/**
 * Criteria file format: a JSON object keyed like SerialPortCriteria.
 * USB IDs may be written as numbers or as "0x…" strings.
 *
 * {
 *   "vendorId": "0x2341",
 *   "serialNumber": "85735313"
 * }
 */
export const criteriaFileSchema = z
  .object({
    ...criteriaShape,
    vendorId: fileUsbId,
    productId: fileUsbId,
  })
  .partial()
  .strict();
