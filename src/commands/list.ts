import type { SerialPortDescriptor } from "../device/types.js";
import { describeCriteria, matchesCriteria } from "../serial/criteria.js";
import { listSerialPorts } from "../serial/discovery.js";
import * as log from "../utils/logger.js";
import { resolveCriteria, type CriteriaOptions } from "./criteria.js";

export interface ListOptions extends CriteriaOptions {
  json?: boolean;
}

export function formatPortLine(port: SerialPortDescriptor): string {
  return [port.path, port.description ?? "n/a", port.hwid ?? "n/a"].join("\t");
}

/**
 * List attached serial ports, optionally narrowed by criteria
 */
export async function listCommand(
  options: ListOptions,
): Promise<SerialPortDescriptor[]> {
  const criteria = await resolveCriteria(options);
  const ports = (await listSerialPorts()).filter((port) =>
    matchesCriteria(port, criteria),
  );

  if (options.json) {
    console.log(JSON.stringify(ports, null, 2));
    return ports;
  }

  if (ports.length === 0) {
    log.warn(
      Object.keys(criteria).length > 0
        ? `No serial ports match ${describeCriteria(criteria)}`
        : "No serial ports found.",
    );
    return ports;
  }

  for (const port of ports) {
    console.log(formatPortLine(port));
  }
  return ports;
}
