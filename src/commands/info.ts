import { SERIAL_PORT_ATTRIBUTES, type SerialPortDescriptor } from "../device/types.js";
import { formatUsbId } from "../serial/criteria.js";
import { serialPortInfo } from "../serial/finder.js";

export interface InfoOptions {
  json?: boolean;
}

export function formatPortInfo(port: SerialPortDescriptor): string[] {
  const width = Math.max(...SERIAL_PORT_ATTRIBUTES.map((a) => a.length));

  return SERIAL_PORT_ATTRIBUTES.map((attribute) => {
    const value = port[attribute];
    let rendered: string;
    if (value === null) {
      rendered = "null";
    } else if (typeof value === "number") {
      rendered = `0x${formatUsbId(value)} (${value})`;
    } else {
      rendered = value;
    }
    return `${attribute.padEnd(width)}  ${rendered}`;
  });
}

/**
 * Print every attribute of one port
 */
export async function infoCommand(
  path: string,
  options: InfoOptions,
): Promise<SerialPortDescriptor> {
  const port = await serialPortInfo(path);

  if (options.json) {
    console.log(JSON.stringify(port, null, 2));
  } else {
    for (const line of formatPortInfo(port)) {
      console.log(line);
    }
  }

  return port;
}
