/**
 * Schema types
 */

/** Any value an example may carry */
export type ExampleValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | ExampleValue[]
  | { [key: string]: ExampleValue };

export type ExampleRecord = { [key: string]: ExampleValue };

export type FieldType =
  | "string"
  | "integer"
  | "float"
  | "decimal"
  | "boolean"
  | "date"
  | "datetime"
  | "list"
  | "map"
  | "null"
  | "unknown";

export interface SchemaField {
  /** Dot path from the root; array elements use `[]` */
  readonly path: string;
  /** Last path segment */
  readonly name: string;
  readonly type: FieldType;
  /** Every type seen at this path, in first-seen order (null excluded) */
  readonly observedTypes: readonly FieldType[];
  readonly nullable: boolean;
  /** Present in every example */
  readonly required: boolean;
  readonly depth: number;
  readonly isArray: boolean;
  /** Joined element type, for lists */
  readonly itemType?: FieldType;
  /** Distinct sample values, bounded */
  readonly samples: readonly ExampleValue[];
}

export interface Schema {
  /** Path -> field, in first-seen order */
  readonly fields: ReadonlyMap<string, SchemaField>;
  readonly exampleCount: number;
  readonly maxDepth: number;
}

export type SchemaDifferenceKind =
  | "field-added"
  | "field-removed"
  | "type-changed"
  | "field-renamed";

export interface SchemaDifference {
  readonly kind: SchemaDifferenceKind;
  readonly path: string;
  /** Rename target */
  readonly toPath?: string;
  readonly fromType?: FieldType;
  readonly toType?: FieldType;
  /** Sample similarity, for renames */
  readonly similarity?: number;
  readonly description: string;
}
