/** On-disk shape of an interface dump, see `schema/interface-dump-v1.json`. */

export const DUMP_SCHEMA_ID = 'interface-dump-v1';

export type RawName = {
  /** Integer, or decimal text for keys past `Number.MAX_SAFE_INTEGER`. */
  key: number | string;
  name: string;
};

export type RawTypeTerm = { var: RawName } | { struct?: string; args: number[] };

export type RawIdentifier =
  | { module: string; type?: number | null; context: string[] }
  | { name: RawName; type?: number | null; context: string[] };

export type RawNode = {
  /** Free-form source span, kept for debug output only. */
  span?: string;
  annotations?: [string, string][];
  types?: number[];
  identifiers?: RawIdentifier[];
  children?: RawNode[];
};

export type RawDumpFile = {
  schema: typeof DUMP_SCHEMA_ID;
  module: string;
  path: string;
  types: RawTypeTerm[];
  roots: RawNode[];
};
