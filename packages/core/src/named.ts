/**
 * Values passed by field name at construction time
 */

export class NamedValues<Field extends string = string> {
  constructor(readonly values: Readonly<Partial<Record<Field, unknown>>>) {}
}

/**
 * Mark the trailing constructor argument as values by field name.
 *
 * @example
 * ```typescript
 * const Rgb = defineRecord('Rgb', 'red green blue', { defaults: [0, 0, 0] });
 * const navy = new Rgb(named({ blue: 128 }));
 * ```
 */
export function named<Field extends string>(
  values: Readonly<Partial<Record<Field, unknown>>>
): NamedValues<Field> {
  return new NamedValues(values);
}

/**
 * Separate positional values from a trailing NamedValues marker
 */
export function splitArguments(args: readonly unknown[]): {
  positional: readonly unknown[];
  namedEntries: Array<[string, unknown]>;
} {
  const last = args[args.length - 1];
  if (last instanceof NamedValues) {
    return { positional: args.slice(0, -1), namedEntries: Object.entries(last.values) };
  }
  return { positional: args, namedEntries: [] };
}
