import * as path from "path";
import { SerialPort } from "serialport";
import type { SerialPortDescriptor } from "../device/types.js";
import * as log from "../utils/logger.js";
import { formatUsbId, parseUsbId } from "./criteria.js";
import { DEFAULT_SYSFS_ROOT, readSysfsPortInfo, type SysfsPortInfo } from "./sysfs.js";

export type PortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

export interface DiscoveryOptions {
  /** Source of raw port records. Defaults to `SerialPort.list()`. */
  lister?: () => Promise<PortInfo[]>;
  /**
   * Directory sysfs is mounted on, or null to skip sysfs enrichment.
   * Defaults to /sys on Linux and null elsewhere.
   */
  sysfsRoot?: string | null;
}

function normalizeSerialNumber(serialNumber?: string | null): string | null {
  if (serialNumber === undefined || serialNumber === null) return null;
  const trimmed = serialNumber.trim();
  if (!trimmed) return trimmed;

  const lowered = trimmed.toLowerCase();
  if (lowered === "n/a" || lowered === "na" || lowered === "unknown") {
    return null;
  }

  const cleaned =
    trimmed.startsWith("0x") || trimmed.startsWith("0X")
      ? trimmed.slice(2)
      : trimmed;
  if (/^0+$/.test(cleaned)) {
    return null;
  }

  return trimmed;
}

function usbDescription(
  name: string,
  product: string | null,
  iface: string | null,
): string {
  if (iface) return `${product ?? name} - ${iface}`;
  return product || name;
}

function usbHwid(
  vendorId: number,
  productId: number,
  serialNumber: string | null,
  location: string | null,
): string {
  let hwid = `USB VID:PID=${formatUsbId(vendorId)}:${formatUsbId(productId)}`;
  if (serialNumber) hwid += ` SER=${serialNumber}`;
  if (location) hwid += ` LOCATION=${location}`;
  return hwid;
}

/**
 * Merge a raw port record with what sysfs knows about it. sysfs wins.
 */
export function buildDescriptor(
  port: PortInfo,
  sysfs: SysfsPortInfo | null,
): SerialPortDescriptor {
  const name = path.basename(port.path);
  const vendorId = sysfs?.vendorId ?? parseUsbId(port.vendorId);
  const productId = sysfs?.productId ?? parseUsbId(port.productId);
  const serialNumber = normalizeSerialNumber(
    sysfs?.serialNumber ?? port.serialNumber,
  );
  const location = sysfs?.location ?? port.locationId ?? null;
  const product = sysfs?.product ?? null;
  const iface = sysfs?.interface ?? null;
  const isUsb = vendorId !== null && productId !== null;

  let description: string | null = null;
  let hwid: string | null = null;
  if (isUsb) {
    description = usbDescription(name, product, iface);
    hwid = usbHwid(vendorId, productId, serialNumber, location);
  } else if (sysfs?.subsystem === "pnp") {
    description = name;
    hwid = sysfs.pnpId;
  }

  return Object.freeze({
    path: port.path,
    name,
    description,
    hwid,
    vendorId,
    productId,
    serialNumber,
    location,
    manufacturer: sysfs?.manufacturer ?? port.manufacturer ?? null,
    product,
    interface: iface,
    pnpId: port.pnpId ?? null,
    subsystem: sysfs?.subsystem ?? null,
    devicePath: sysfs?.devicePath ?? null,
    usbDevicePath: sysfs?.usbDevicePath ?? null,
    usbInterfacePath: sysfs?.usbInterfacePath ?? null,
  });
}

/**
 * Enumerate the serial ports attached right now
 */
export async function listSerialPorts(
  options: DiscoveryOptions = {},
): Promise<SerialPortDescriptor[]> {
  const lister = options.lister ?? (() => SerialPort.list());
  const sysfsRoot =
    options.sysfsRoot !== undefined
      ? options.sysfsRoot
      : process.platform === "linux"
        ? DEFAULT_SYSFS_ROOT
        : null;

  const ports = await lister();
  log.debug(`Found ${ports.length} serial ports`);

  const descriptors: SerialPortDescriptor[] = [];
  for (const port of ports) {
    const sysfs = sysfsRoot
      ? await readSysfsPortInfo(sysfsRoot, path.basename(port.path))
      : null;
    descriptors.push(buildDescriptor(port, sysfs));
  }

  return descriptors;
}
