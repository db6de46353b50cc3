// Resolved-type information attached by the semantic layer.

export interface TypeDescriptor {
  /** Short name as written in markup, e.g. `Button`. */
  readonly name: string;
  /** CLR-qualified name, e.g. `System.Windows.Controls.Button`. */
  readonly fullName: string;
  readonly xmlNamespace: string;
  readonly baseType: string | null;
  readonly contentProperty: string | null;
  readonly isMarkupExtension: boolean;
}

export type MemberKind = "property" | "event";

export interface PropertyDescriptor {
  readonly name: string;
  /** Short name of the type that declares the member. */
  readonly declaringType: string;
  /** Short name of the value type (`Visibility`, `Brush`, ...) or the handler type for events. */
  readonly valueType: string;
  readonly kind: MemberKind;
  readonly isAttached: boolean;
}
