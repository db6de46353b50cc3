import { fileURLToPath } from "node:url";

import { JsonMappingRepository } from "./repository.js";

/** Location of the bundled WPF → Avalonia mapping database. */
export const DEFAULT_MAPPINGS_PATH = fileURLToPath(new URL("../data/default-mappings.json", import.meta.url));

let cached: JsonMappingRepository | null = null;

/**
 * Load the bundled mapping database. The repository is read-only, so one
 * instance is shared by every caller.
 */
export function loadDefaultMappings(): JsonMappingRepository {
  cached ??= JsonMappingRepository.fromFile(DEFAULT_MAPPINGS_PATH);
  return cached;
}
