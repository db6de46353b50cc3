/**
 * Mapping data could not be read or does not have the expected shape.
 */
export class MappingLoadError extends Error {
  constructor(
    message: string,
    public readonly code: MappingLoadErrorCodeType,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "MappingLoadError";
  }
}

/** Error codes */
export const MappingLoadErrorCode = {
  READ_FAILED: "MAPPING_READ_FAILED",
  INVALID_JSON: "MAPPING_INVALID_JSON",
  INVALID_SHAPE: "MAPPING_INVALID_SHAPE",
} as const;

export type MappingLoadErrorCodeType = (typeof MappingLoadErrorCode)[keyof typeof MappingLoadErrorCode];
