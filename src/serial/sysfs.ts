import * as fs from "fs/promises";
import * as path from "path";
import { parseUsbId } from "./criteria.js";

export const DEFAULT_SYSFS_ROOT = "/sys";

/**
 * What Linux exposes about a tty under /sys/class/tty/<name>
 */
export interface SysfsPortInfo {
  devicePath: string;
  subsystem: string | null;
  usbInterfacePath: string | null;
  usbDevicePath: string | null;
  vendorId: number | null;
  productId: number | null;
  serialNumber: string | null;
  location: string | null;
  manufacturer: string | null;
  product: string | null;
  interface: string | null;
  /** `id` attribute of pnp devices */
  pnpId: string | null;
}

function isMissing(error: unknown): boolean {
  const code = (error as NodeJS.ErrnoException).code;
  return code === "ENOENT" || code === "ENOTDIR";
}

async function realpathOrNull(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

/**
 * First line of a sysfs attribute file, or null when the file is missing
 */
async function readLine(dir: string, attribute: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path.join(dir, attribute), "utf-8");
    const line = content.split("\n", 1)[0].trim();
    return line;
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

/**
 * Read USB and subsystem details for a tty from sysfs.
 * Returns null when the tty has no backing device (virtual consoles, ptys).
 */
export async function readSysfsPortInfo(
  root: string,
  name: string,
): Promise<SysfsPortInfo | null> {
  const devicePath = await realpathOrNull(
    path.join(root, "class", "tty", name, "device"),
  );
  if (!devicePath) return null;

  const subsystemPath = await realpathOrNull(path.join(devicePath, "subsystem"));
  const subsystem = subsystemPath ? path.basename(subsystemPath) : null;

  // usb-serial ttys sit one level below their interface, cdc-acm ttys on it
  let usbInterfacePath: string | null = null;
  if (subsystem === "usb-serial") {
    usbInterfacePath = path.dirname(devicePath);
  } else if (subsystem === "usb") {
    usbInterfacePath = devicePath;
  }

  const info: SysfsPortInfo = {
    devicePath,
    subsystem,
    usbInterfacePath,
    usbDevicePath: null,
    vendorId: null,
    productId: null,
    serialNumber: null,
    location: null,
    manufacturer: null,
    product: null,
    interface: null,
    pnpId: null,
  };

  if (usbInterfacePath) {
    const usbDevicePath = path.dirname(usbInterfacePath);
    const interfaceCount =
      Number.parseInt((await readLine(usbDevicePath, "bNumInterfaces")) ?? "", 10) || 1;

    info.usbDevicePath = usbDevicePath;
    info.vendorId = parseUsbId(await readLine(usbDevicePath, "idVendor"));
    info.productId = parseUsbId(await readLine(usbDevicePath, "idProduct"));
    info.serialNumber = await readLine(usbDevicePath, "serial");
    info.location = path.basename(
      interfaceCount > 1 ? usbInterfacePath : usbDevicePath,
    );
    info.manufacturer = await readLine(usbDevicePath, "manufacturer");
    info.product = await readLine(usbDevicePath, "product");
    info.interface = await readLine(usbInterfacePath, "interface");
  } else if (subsystem === "pnp") {
    info.pnpId = await readLine(devicePath, "id");
  }

  return info;
}
