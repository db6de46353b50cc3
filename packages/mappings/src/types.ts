/* =============================================================================
 * MAPPING RECORDS
 * ============================================================================= */

/** Fields every mapping record carries. */
export interface MappingRecordBase {
  /** Identifier in the source framework (WPF). */
  readonly source: string;
  /** Identifier in the target framework (Avalonia). */
  readonly target: string;
  /** Free-text note surfaced in diagnostics. */
  readonly note?: string;
  /** A human should look at every site this mapping touches. */
  readonly requiresManualReview: boolean;
}

/** XML namespace URI (or clr-namespace) mapping. */
export type NamespaceMapping = MappingRecordBase;

export interface TypeMapping extends MappingRecordBase {
  /** XML namespace the target type lives in, when it differs from the default. */
  readonly targetNamespace?: string;
}

export interface PropertyMapping extends MappingRecordBase {
  /** Restricts the mapping to properties on this owner type. */
  readonly ownerType?: string;
  /** Tag naming a value conversion, e.g. `visibility-to-boolean`. */
  readonly valueConversion?: string;
  /** The target property has a different value type. */
  readonly typeChanged: boolean;
  readonly isAttached: boolean;
}

export interface EventMapping extends MappingRecordBase {
  readonly ownerType?: string;
  /** Handler signature differs between frameworks. */
  readonly signatureChanged: boolean;
}

/** Serialized form of a whole mapping database. */
export interface MappingDatabase {
  readonly version: string;
  readonly namespaces: readonly NamespaceMapping[];
  readonly types: readonly TypeMapping[];
  readonly properties: readonly PropertyMapping[];
  readonly events: readonly EventMapping[];
}

/* =============================================================================
 * REPOSITORY CONTRACT
 * ============================================================================= */

/**
 * Read-only lookup from source identifiers to target identifiers.
 *
 * Property and event lookups try the owner-specific record first and fall
 * back to the general one. Implementations never mutate after construction,
 * so one instance can serve any number of concurrent conversions.
 */
export interface MappingRepository {
  findNamespaceMapping(sourceNamespace: string): NamespaceMapping | null;
  findTypeMapping(sourceTypeName: string): TypeMapping | null;
  findPropertyMapping(sourcePropertyName: string, ownerTypeName?: string | null): PropertyMapping | null;
  findEventMapping(sourceEventName: string, ownerTypeName?: string | null): EventMapping | null;
}
