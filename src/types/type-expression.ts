/** Scalar keywords of the type-definition mini-language */
export const SCALAR_KINDS = [
  "string",
  "int",
  "float",
  "boolean",
  "datetime",
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

/** Magnitude suffixes allowed on a range bound */
export const BOUND_UNITS = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
} as const;

export type BoundUnit = keyof typeof BOUND_UNITS;

/** One side of a range(min, max) expression */
export interface NumericBound {
  /** Resolved numeric value (literal × unit multiplier) */
  value: number;
  /** The bound as authored, e.g. "10M" or "1B+" */
  raw: string;
  unit?: BoundUnit;
  /** Authored with a trailing "+"; carries no effect on `value` */
  openEnded: boolean;
}

export interface ScalarType {
  kind: "scalar";
  scalar: ScalarKind;
}

export interface EnumType {
  kind: "enum";
  /** Ordered values with their quotes stripped */
  values: string[];
}

export interface ListType {
  kind: "list";
  items: TypeExpression;
}

export interface RangeType {
  kind: "range";
  min: NumericBound;
  max: NumericBound;
}

/** A "complex" property declared as a nested mapping of properties */
export interface ObjectType {
  kind: "object";
  properties: Record<string, TypeExpression>;
}

/** Structured form of a type-definition string (or nested property mapping) */
export type TypeExpression =
  | ScalarType
  | EnumType
  | ListType
  | RangeType
  | ObjectType;

export type TypeExpressionKind = TypeExpression["kind"];
