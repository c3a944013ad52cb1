import * as fs from "fs/promises";
import * as path from "path";
import type { SerialPortCriteria } from "../device/types.js";
import { formatIssues } from "../serial/criteria.js";
import { ConfigError, ValidationError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import { criteriaFileSchema } from "./schema.js";

/**
 * Load saved criteria from a JSON file
 */
export async function readCriteriaFile(
  file: string,
): Promise<SerialPortCriteria> {
  const resolved = path.resolve(file);

  let content: string;
  try {
    content = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Criteria file not found: ${resolved}`);
    }
    throw new ConfigError(
      `Failed to read ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = criteriaFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Invalid criteria in ${resolved}: ${formatIssues(result.error)}`,
    );
  }

  log.debug(`Loaded criteria from ${resolved}`);
  return result.data;
}
