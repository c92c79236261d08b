// utility to define enums with attached data, without boilerplate scattered around.

// export const kFlip = defineEnum({
//    standard: { value: 0, title: "none" },
//    flipHorizontal: { value: 1, title: "horizontal" },
// } as const);
//
// kFlip.keys;                      // ("standard" | "flipHorizontal")[]
// kFlip.key.standard;              // "standard"
// kFlip.infoByKey.standard.title;  // "none"
// kFlip.coerceByValue(1)?.key;     // "flipHorizontal"
// type FlipKey = typeof kFlip.$key;

type EnumValue = string | number;

// the input definition. requires at least a "value" field, can have any other fields.
type EnumDef = Record<string, { readonly value: EnumValue }>;

type EnumKeyUnion<D extends EnumDef> = keyof D & string;
type EnumValueUnion<D extends EnumDef> = D[EnumKeyUnion<D>]["value"];

type EnumInfo<D extends EnumDef, K extends EnumKeyUnion<D>> = {
  key: K;
} & D[K];
type EnumInfoUnion<D extends EnumDef> = {
  [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
}[EnumKeyUnion<D>];

export function defineEnum<const D extends EnumDef>(def: D) {
  // at least one key; Object.keys loses the literal types so they are restored here.
  const keys = Object.keys(def) as [EnumKeyUnion<D>, ...EnumKeyUnion<D>[]];

  // key.standard -> "standard"
  const key = Object.fromEntries(keys.map((k) => [k, k])) as {
    [K in EnumKeyUnion<D>]: K;
  };

  const infoByKey = Object.fromEntries(keys.map((k) => [k, { key: k, ...def[k] }])) as {
    [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
  };

  const infos = keys.map((k) => ({ key: k, ...def[k] })) as EnumInfoUnion<D>[];
  const values = keys.map((k) => def[k].value) as EnumValueUnion<D>[];

  // reverse lookup (Map handles number keys cleanly)
  const infoByValue = new Map<EnumValue, EnumInfoUnion<D>>();
  for (let i = 0; i < keys.length; i++) {
    const value: EnumValue = def[keys[i]].value;
    if (infoByValue.has(value)) {
      throw new Error(`Duplicate enum value: ${String(value)}`);
    }
    infoByValue.set(value, infos[i]);
  }

  // phantom fields for type extraction convenience
  const $key = null as unknown as EnumKeyUnion<D>;
  const $value = null as unknown as EnumValueUnion<D>;
  const $info = null as unknown as EnumInfoUnion<D>;

  function isValidKey(k: unknown): k is EnumKeyUnion<D> {
    return typeof k === "string" && Object.prototype.hasOwnProperty.call(def, k);
  }

  function coerceByKey(k: unknown): EnumInfoUnion<D> | undefined {
    return isValidKey(k) ? infos[keys.indexOf(k)] : undefined;
  }

  function coerceByValue(v: unknown): EnumInfoUnion<D> | undefined {
    if (typeof v !== "string" && typeof v !== "number") {
      return undefined;
    }
    return infoByValue.get(v);
  }

  return {
    $key,
    $value,
    $info,

    key, // e.key.standard -> "standard"
    infoByKey,
    byKey: def,

    keys,
    values,
    infos,

    isValidKey,
    coerceByKey,
    coerceByValue,
  } as const;
}
