/**
 * Snapshot of one attached serial device.
 * Attributes the platform cannot supply are `null`, never `""` or `0`.
 */
export interface SerialPortDescriptor {
  /** OS device path, e.g. `/dev/ttyACM0` or `COM3` */
  path: string;
  /** Base name of `path` */
  name: string;
  description: string | null;
  /** e.g. `USB VID:PID=2341:0043 SER=85735313 LOCATION=1-2:1.0` */
  hwid: string | null;
  vendorId: number | null;
  productId: number | null;
  serialNumber: string | null;
  location: string | null;
  manufacturer: string | null;
  product: string | null;
  interface: string | null;
  pnpId: string | null;
  // Linux sysfs only
  subsystem: string | null;
  devicePath: string | null;
  usbDevicePath: string | null;
  usbInterfacePath: string | null;
}

export type SerialPortAttribute = keyof SerialPortDescriptor;

/**
 * Attribute/value pairs a port must carry to match. `null` matches only an
 * absent attribute; `undefined` places no constraint.
 */
export type SerialPortCriteria = Partial<SerialPortDescriptor>;

export const SERIAL_PORT_ATTRIBUTES = [
  "path",
  "name",
  "description",
  "hwid",
  "vendorId",
  "productId",
  "serialNumber",
  "location",
  "manufacturer",
  "product",
  "interface",
  "pnpId",
  "subsystem",
  "devicePath",
  "usbDevicePath",
  "usbInterfacePath",
] as const satisfies readonly SerialPortAttribute[];

export const NUMERIC_ATTRIBUTES = ["vendorId", "productId"] as const satisfies readonly SerialPortAttribute[];

export type NumericAttribute = (typeof NUMERIC_ATTRIBUTES)[number];

export function isSerialPortAttribute(key: string): key is SerialPortAttribute {
  return SERIAL_PORT_ATTRIBUTES.some((attribute) => attribute === key);
}

export function isNumericAttribute(key: string): key is NumericAttribute {
  return NUMERIC_ATTRIBUTES.some((attribute) => attribute === key);
}
