export {
  findSerialPort,
  findSerialPorts,
  serialPortInfo,
} from "./serial/finder.js";
export {
  listSerialPorts,
  type DiscoveryOptions,
  type PortInfo,
} from "./serial/discovery.js";
export {
  describeCriteria,
  matchesCriteria,
  validateCriteria,
} from "./serial/criteria.js";
export { readCriteriaFile } from "./config/reader.js";
export {
  SERIAL_PORT_ATTRIBUTES,
  type SerialPortAttribute,
  type SerialPortCriteria,
  type SerialPortDescriptor,
} from "./device/types.js";
export {
  ConfigError,
  MultipleSerialPortsError,
  NoSuchSerialPortError,
  SerialFinderError,
  ValidationError,
  type SerialFinderErrorCode,
} from "./utils/errors.js";
