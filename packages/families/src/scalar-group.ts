/**
 * Attributes that share one value codec, grouped under a name-to-kind
 * table.
 *
 * A catalog folds, say, every u32 attribute into a single union member
 * (`{ type: "mtu" | "master" | ...; value: number }`) and lets the group
 * describe and parse all of them.
 */

import type { Result } from "better-result";
import type { AttributeDecodeFailedError } from "@nlroute/errors";
import {
  parseScalar,
  scalar,
  type DecodeContext,
  type LeafDescriptor,
  type NlaRecord,
  type ValueCodec,
} from "@nlroute/codec";

export type KindTable<K extends string> = { readonly [P in K]: number };

export interface ScalarGroup<K extends string, T> {
  readonly table: KindTable<K>;
  has<A extends { type: string }>(attribute: A): attribute is Extract<A, { type: K }>;
  describe(attribute: { type: K; value: T }): LeafDescriptor;
  /** Undefined when the kind is not in this group */
  parse<A>(
    record: NlaRecord,
    context: DecodeContext,
    wrap: (attribute: { type: K; value: T }) => A
  ): Result<A, AttributeDecodeFailedError> | undefined;
}

function isKeyOf<K extends string>(table: KindTable<K>, name: string): name is K {
  return Object.prototype.hasOwnProperty.call(table, name);
}

export function scalarGroup<K extends string, T>(
  table: KindTable<K>,
  codec: ValueCodec<T>
): ScalarGroup<K, T> {
  const names = new Map<number, K>();
  for (const name of Object.keys(table)) {
    if (isKeyOf(table, name)) {
      names.set(table[name], name);
    }
  }

  return {
    table,
    has: <A extends { type: string }>(attribute: A): attribute is Extract<A, { type: K }> =>
      isKeyOf(table, attribute.type),
    describe: (attribute) => scalar(table[attribute.type], codec, attribute.value),
    parse: (record, context, wrap) => {
      const name = names.get(record.kind);
      if (name === undefined) {
        return undefined;
      }
      return parseScalar(record, context, codec, (value) => wrap({ type: name, value }));
    },
  };
}
