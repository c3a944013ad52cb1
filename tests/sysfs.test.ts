import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

vi.mock("serialport", () => {
  return {
    SerialPort: {
      list: vi.fn(),
    },
  };
});

const { readSysfsPortInfo } = await import("../src/serial/sysfs.js");
const { listSerialPorts } = await import("../src/serial/discovery.js");

async function writeAttributes(
  dir: string,
  attributes: Record<string, string>,
): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const [name, value] of Object.entries(attributes)) {
    await fs.writeFile(path.join(dir, name), `${value}\n`);
  }
}

async function link(target: string, linkPath: string): Promise<void> {
  await fs.mkdir(path.dirname(linkPath), { recursive: true });
  await fs.mkdir(target, { recursive: true });
  await fs.symlink(target, linkPath);
}

// The fixture mirrors sysfs with real symlinks, which Windows only lets
// elevated or developer-mode processes create; sysfs itself is Linux-only.
describe.skipIf(process.platform === "win32")("sysfs enrichment", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(
      await fs.mkdtemp(path.join(os.tmpdir(), "sysfs-")),
    );
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("reads a cdc-acm device from its interface node", async () => {
    const usbDevice = path.join(root, "devices", "pci0000:00", "usb1", "1-2");
    const usbInterface = path.join(usbDevice, "1-2:1.0");
    await writeAttributes(usbDevice, {
      idVendor: "2341",
      idProduct: "0043",
      serial: "85735313",
      manufacturer: "Arduino (www.arduino.cc)",
      product: "Uno",
      bNumInterfaces: " 2",
    });
    await link(path.join(root, "bus", "usb"), path.join(usbInterface, "subsystem"));
    await link(usbInterface, path.join(root, "class", "tty", "ttyACM0", "device"));

    const info = await readSysfsPortInfo(root, "ttyACM0");

    expect(info).toEqual({
      devicePath: usbInterface,
      subsystem: "usb",
      usbInterfacePath: usbInterface,
      usbDevicePath: usbDevice,
      vendorId: 0x2341,
      productId: 0x0043,
      serialNumber: "85735313",
      location: "1-2:1.0",
      manufacturer: "Arduino (www.arduino.cc)",
      product: "Uno",
      interface: null,
      pnpId: null,
    });
  });

  it("builds descriptors for usb-serial adapters", async () => {
    const usbDevice = path.join(root, "devices", "pci0000:00", "usb1", "1-3");
    const usbInterface = path.join(usbDevice, "1-3:1.0");
    const tty = path.join(usbInterface, "ttyUSB0");
    await writeAttributes(usbDevice, {
      idVendor: "0403",
      idProduct: "6001",
      serial: "A50285BI",
      manufacturer: "FTDI",
      product: "FT232R USB UART",
    });
    await writeAttributes(usbInterface, { interface: "FT232R USB UART" });
    await link(path.join(root, "bus", "usb-serial"), path.join(tty, "subsystem"));
    await link(tty, path.join(root, "class", "tty", "ttyUSB0", "device"));

    const lister = vi.fn(async () => [
      {
        path: "/dev/ttyUSB0",
        manufacturer: undefined,
        serialNumber: undefined,
        pnpId: undefined,
        locationId: undefined,
        productId: undefined,
        vendorId: undefined,
      },
    ]);

    const [port] = await listSerialPorts({ lister, sysfsRoot: root });

    expect(port).toEqual({
      path: "/dev/ttyUSB0",
      name: "ttyUSB0",
      description: "FT232R USB UART - FT232R USB UART",
      hwid: "USB VID:PID=0403:6001 SER=A50285BI LOCATION=1-3",
      vendorId: 0x0403,
      productId: 0x6001,
      serialNumber: "A50285BI",
      location: "1-3",
      manufacturer: "FTDI",
      product: "FT232R USB UART",
      interface: "FT232R USB UART",
      pnpId: null,
      subsystem: "usb-serial",
      devicePath: tty,
      usbDevicePath: usbDevice,
      usbInterfacePath: usbInterface,
    });
  });

  it("prefers sysfs values over the lister's", async () => {
    const usbDevice = path.join(root, "devices", "usb1", "1-4");
    const usbInterface = path.join(usbDevice, "1-4:1.0");
    await writeAttributes(usbDevice, {
      idVendor: "2e8a",
      idProduct: "000a",
      manufacturer: "Raspberry Pi",
      product: "Pico",
    });
    await link(path.join(root, "bus", "usb"), path.join(usbInterface, "subsystem"));
    await link(usbInterface, path.join(root, "class", "tty", "ttyACM1", "device"));

    const lister = vi.fn(async () => [
      {
        path: "/dev/ttyACM1",
        manufacturer: "Raspberry_Pi",
        serialNumber: "E6614103E7",
        pnpId: "usb-Raspberry_Pi_Pico_E6614103E7-if00",
        locationId: undefined,
        productId: "000a",
        vendorId: "2e8a",
      },
    ]);

    const [port] = await listSerialPorts({ lister, sysfsRoot: root });

    expect(port.manufacturer).toBe("Raspberry Pi");
    expect(port.serialNumber).toBe("E6614103E7");
    expect(port.description).toBe("Pico");
    expect(port.hwid).toBe("USB VID:PID=2E8A:000A SER=E6614103E7 LOCATION=1-4");
  });

  it("reads empty attribute files as empty strings", async () => {
    const usbDevice = path.join(root, "devices", "usb1", "1-5");
    const usbInterface = path.join(usbDevice, "1-5:1.0");
    await writeAttributes(usbDevice, {
      idVendor: "1a86",
      idProduct: "7523",
      manufacturer: "",
      product: "USB Serial",
    });
    await writeAttributes(usbInterface, { interface: "" });
    await link(path.join(root, "bus", "usb-serial"), path.join(usbInterface, "ttyUSB1", "subsystem"));
    await link(
      path.join(usbInterface, "ttyUSB1"),
      path.join(root, "class", "tty", "ttyUSB1", "device"),
    );

    const info = await readSysfsPortInfo(root, "ttyUSB1");

    expect(info?.manufacturer).toBe("");
    expect(info?.interface).toBe("");
    expect(info?.serialNumber).toBeNull();
  });

  it("reads the id of pnp serial ports", async () => {
    const device = path.join(root, "devices", "pnp0", "00:04");
    await writeAttributes(device, { id: "PNP0501" });
    await link(path.join(root, "bus", "pnp"), path.join(device, "subsystem"));
    await link(device, path.join(root, "class", "tty", "ttyS0", "device"));

    const lister = vi.fn(async () => [
      {
        path: "/dev/ttyS0",
        manufacturer: undefined,
        serialNumber: undefined,
        pnpId: undefined,
        locationId: undefined,
        productId: undefined,
        vendorId: undefined,
      },
    ]);

    const [port] = await listSerialPorts({ lister, sysfsRoot: root });

    expect(port.subsystem).toBe("pnp");
    expect(port.description).toBe("ttyS0");
    expect(port.hwid).toBe("PNP0501");
    expect(port.usbDevicePath).toBeNull();
  });

  it("returns null for ttys without a backing device", async () => {
    await fs.mkdir(path.join(root, "class", "tty", "tty1"), { recursive: true });

    expect(await readSysfsPortInfo(root, "tty1")).toBeNull();
    expect(await readSysfsPortInfo(root, "ttyNONE")).toBeNull();
  });
});
