/**
 * Repository identifiers from a directory of JSON metadata records.
 */
import { z } from "zod";
import type { Logger } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";

export const DEFAULT_IDENTIFIER_FIELD = "mods_id_bdr_pid_ssim";

const MetadataRecordSchema = z.record(z.unknown());
const IdentifierListSchema = z.array(z.unknown()).nonempty();

function isTopLevelJson(key: string): boolean {
  return !key.includes("/") && key.endsWith(".json");
}

/**
 * Read the first identifier of `field` from every top-level `*.json` file,
 * in file-name order. Files that cannot be used are logged and skipped.
 */
export async function fetchIdentifiersFromMetadata(
  storage: StorageBackend,
  opts: { field?: string; logger: Logger },
): Promise<string[]> {
  const field = opts.field ?? DEFAULT_IDENTIFIER_FIELD;
  const { logger } = opts;
  const identifiers: string[] = [];

  if (!(await storage.exists(""))) {
    logger.warn(`Metadata directory not found: ${storage.describe("")}`);
    return identifiers;
  }

  const keys = (await storage.list("")).filter(isTopLevelJson);

  for (const key of keys) {
    let json: unknown;
    try {
      const raw = await storage.read(key);
      json = JSON.parse(new TextDecoder().decode(raw));
    } catch (err) {
      logger.warn(`Invalid JSON in ${key}: ${String(err)}`);
      continue;
    }

    const record = MetadataRecordSchema.safeParse(json);
    if (!record.success) {
      logger.debug(`Metadata in ${key} is not an object`);
      continue;
    }

    const list = IdentifierListSchema.safeParse(record.data[field]);
    const first = list.success ? list.data[0] : undefined;
    if (typeof first !== "string" || first === "") {
      logger.debug(`Missing or malformed ${field} in ${key}`);
      continue;
    }
    identifiers.push(first);
  }

  logger.info(`Found ${identifiers.length} identifiers in metadata files`);
  return identifiers;
}
