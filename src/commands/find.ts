import { describeCriteria } from "../serial/criteria.js";
import { findSerialPort } from "../serial/finder.js";
import * as log from "../utils/logger.js";
import { resolveCriteria, type CriteriaOptions } from "./criteria.js";

export type FindOptions = CriteriaOptions;

/**
 * Print the path of the single port matching the criteria
 */
export async function findCommand(options: FindOptions): Promise<string> {
  const criteria = await resolveCriteria(options);
  log.debug(`Looking for ${describeCriteria(criteria)}`);

  const path = await findSerialPort(criteria);
  console.log(path);
  return path;
}
