import type { SerialPortCriteria, SerialPortDescriptor } from "../device/types.js";
import { MultipleSerialPortsError, NoSuchSerialPortError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import { describeCriteria, matchesCriteria, validateCriteria } from "./criteria.js";
import { listSerialPorts, type DiscoveryOptions } from "./discovery.js";

/**
 * Find every attached serial port matching all of the given criteria.
 * Paths are returned in enumeration order; an empty list is not an error.
 *
 * @example
 * await findSerialPorts({ manufacturer: "Arduino LLC" }); // ["/dev/ttyACM0"]
 */
export async function findSerialPorts(
  criteria: SerialPortCriteria = {},
  options?: DiscoveryOptions,
): Promise<string[]> {
  const validated = validateCriteria(criteria);
  const ports = await listSerialPorts(options);

  const matching: string[] = [];
  for (const port of ports) {
    if (matchesCriteria(port, validated)) {
      log.debug(`${port.path} matches ${describeCriteria(validated)}`);
      matching.push(port.path);
    }
  }

  return matching;
}

/**
 * Find the one attached serial port matching the given criteria.
 *
 * @throws NoSuchSerialPortError when nothing matches
 * @throws MultipleSerialPortsError when the criteria match several ports
 *
 * @example
 * await findSerialPort({ vendorId: 0x2341, productId: 0x0043 }); // "/dev/ttyACM0"
 */
export async function findSerialPort(
  criteria: SerialPortCriteria = {},
  options?: DiscoveryOptions,
): Promise<string> {
  const matching = await findSerialPorts(criteria, options);

  if (matching.length === 1) {
    return matching[0];
  }

  const described = describeCriteria(criteria);
  if (matching.length > 1) {
    throw new MultipleSerialPortsError(
      `${matching.length} serial ports match ${described}: ${matching.join(", ")}`,
      matching,
      criteria,
    );
  }

  throw new NoSuchSerialPortError(`No serial port matches ${described}`, {
    criteria,
  });
}

/**
 * Every attribute of the port at `path`, absent ones included as null.
 * Useful for working out which criteria identify a device.
 */
export async function serialPortInfo(
  path: string,
  options?: DiscoveryOptions,
): Promise<SerialPortDescriptor> {
  const ports = await listSerialPorts(options);
  const port = ports.find((p) => p.path === path);

  if (!port) {
    throw new NoSuchSerialPortError(`No serial port at ${path}`, { path });
  }

  return port;
}
