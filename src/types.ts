// Recursive JSON types, declared through interfaces so the aliases can refer to themselves.
export type JsonPrimitive = string | number | boolean | null;

// Declared as an interface to break the circular type alias restriction.
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface JsonArray extends Array<JsonValue> {}

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * Nominal wrapper for opaque handles. A branded number is still a number at
 * runtime, but a `NodeId` cannot be passed where a `SchemaNodeId` is expected.
 */
export type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };
