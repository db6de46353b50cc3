// Mapping records and repository contract
export type {
  EventMapping,
  MappingDatabase,
  MappingRecordBase,
  MappingRepository,
  NamespaceMapping,
  PropertyMapping,
  TypeMapping,
} from "./types.js";

// JSON-backed repository
export { JsonMappingRepository, mergeMappingDatabases, type MappingRepositoryStats } from "./repository.js";
export { parseMappingDatabase } from "./validate.js";
export { DEFAULT_MAPPINGS_PATH, loadDefaultMappings } from "./defaults.js";

// Errors
export { MappingLoadError, MappingLoadErrorCode, type MappingLoadErrorCodeType } from "./errors.js";
