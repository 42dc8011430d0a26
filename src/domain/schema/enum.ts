import { z } from 'zod';

/**
 * A closed set of enumerated values.
 *
 * Each variant maps to exactly one wire token. Tokens are the same in both
 * naming conventions; only structural field names are translated. The
 * in-memory value of an enum field is the token itself.
 *
 * New variants are added by extending the variants object passed to
 * {@link defineEnum}. There is no catch-all variant: unknown tokens on the
 * wire fail decoding.
 */
export interface EnumDescriptor<V extends Record<string, string> = Record<string, string>> {
  /** English type name, e.g. `Division`. */
  readonly name: string;
  /** German type name, e.g. `Sparte`. */
  readonly germanName: string;
  readonly variants: Readonly<V>;
  /** Wire tokens in declaration order. */
  readonly tokens: readonly V[keyof V][];
  readonly schema: z.ZodType<V[keyof V], z.ZodTypeDef, unknown>;
  /** Fixed token lookup used while decoding. */
  readonly byToken: ReadonlyMap<string, V[keyof V]>;
}

const enumsBySchema = new WeakMap<z.ZodTypeAny, EnumDescriptor>();
const enumsByName = new Map<string, EnumDescriptor>();

/**
 * Registers an enumeration.
 *
 * ```ts
 * export const Division = { Electricity: 'STROM', Gas: 'GAS' } as const;
 * export type Division = (typeof Division)[keyof typeof Division];
 * export const divisionEnum = defineEnum('Division', 'Sparte', Division);
 * ```
 */
export function defineEnum<V extends Record<string, string>>(
  name: string,
  germanName: string,
  variants: V,
): EnumDescriptor<V> {
  const tokens: V[keyof V][] = [];
  for (const variant in variants) {
    tokens.push(variants[variant]);
  }

  const [first, ...rest] = tokens;
  if (first === undefined) {
    throw new Error(`Enum ${name} must declare at least one variant`);
  }

  const byToken = new Map<string, V[keyof V]>();
  for (const token of tokens) {
    if (byToken.has(token)) {
      throw new Error(`Enum ${name} maps two variants to the wire token "${token}"`);
    }
    byToken.set(token, token);
  }

  if (enumsByName.has(name)) {
    throw new Error(`Enum ${name} is already defined`);
  }

  const schema = z.enum([first, ...rest]);
  const descriptor: EnumDescriptor<V> = Object.freeze({
    name,
    germanName,
    variants: Object.freeze({ ...variants }),
    tokens: Object.freeze(tokens),
    schema,
    byToken,
  });

  enumsBySchema.set(schema, descriptor);
  enumsByName.set(name, descriptor);
  return descriptor;
}

/**
 * Resolves a wire token against the enum's fixed token set.
 * Returns `undefined` for tokens outside the set.
 */
export function resolveEnumToken<V extends Record<string, string>>(
  descriptor: EnumDescriptor<V>,
  token: string,
): V[keyof V] | undefined {
  return descriptor.byToken.get(token);
}

/** Looks up the enum a zod schema was registered for. */
export function enumForSchema(schema: z.ZodTypeAny): EnumDescriptor | undefined {
  return enumsBySchema.get(schema);
}

/** All registered enums, in definition order. */
export function listEnums(): EnumDescriptor[] {
  return [...enumsByName.values()];
}
