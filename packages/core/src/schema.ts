/**
 * Schema creation and the write path shared by every record
 */

import {
  ABSENT,
  ArityError,
  ConfigurationError,
  LOG_PREFIX,
  RECORD_FLAVORS,
  UnknownFieldError,
  config,
  recordDefinitionSchema,
  splitFieldNames
} from '@recordsmith/shared';
import type { RecordFlavor } from '@recordsmith/shared';
import { splitArguments } from './named';
import type { DefineOptions, FieldSpec, FieldsOf, RecordSchema } from './types';

/**
 * Split a field list into its field names.
 *
 * Note:
 * - The runtime split matches `SplitFields` for space-separated literals, so
 *   the result is typed with the literal field names. This is a type-level
 *   convenience, not a runtime check; `createSchema` validates the names.
 */
export function fieldListOf<Names extends FieldSpec>(names: Names): Array<FieldsOf<Names>> {
  return splitFieldNames(names) as Array<FieldsOf<Names>>;
}

/**
 * Validate a record definition and freeze it into a schema.
 *
 * @param reserved - Member names of the record class; fields may not shadow them
 */
export function createSchema<Field extends string>(
  name: string,
  fields: readonly Field[],
  options: DefineOptions<Field>,
  flavor: RecordFlavor,
  reserved: ReadonlySet<string>
): RecordSchema<Field> {
  const parsed = recordDefinitionSchema.safeParse({
    name,
    fields,
    defaults: options.defaults,
    validator: options.validator,
    indexable: flavor === RECORD_FLAVORS.INDEXABLE
  });

  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigurationError(`Invalid definition for record ${String(name)}: ${message}`, {
      record: String(name),
      issues: parsed.error.issues
    });
  }

  const clash = fields.find(field => reserved.has(field));
  if (clash !== undefined) {
    throw new ConfigurationError(
      `Invalid definition for record ${name}: field name ${clash} is reserved`,
      { record: name, field: clash }
    );
  }

  const schema: RecordSchema<Field> = {
    name: parsed.data.name,
    fields: Object.freeze([...fields]),
    defaults: Object.freeze([...(options.defaults ?? [])]),
    flavor,
    indexable: flavor === RECORD_FLAVORS.INDEXABLE,
    fingerprint: `${parsed.data.name}(${fields.join(',')})`,
    positions: new Map(fields.map((field, index) => [field, index])),
    ...(options.validator ? { validator: options.validator } : {})
  };

  return Object.freeze(schema);
}

// Fields already reported for a validator that returned undefined
const undefinedWarnings = new WeakMap<RecordSchema<string>, Set<string>>();

function warnUndefinedOnce(schema: RecordSchema<string>, field: string): void {
  let warned = undefinedWarnings.get(schema);
  if (!warned) {
    warned = new Set();
    undefinedWarnings.set(schema, warned);
  }
  if (warned.has(field)) return;

  warned.add(field);
  console.warn(
    `${LOG_PREFIX} Validator for ${schema.name} returned undefined for field ${field}. ` +
      'Return the value to store, or throw to reject it.'
  );
}

/**
 * Run a candidate value through the schema's validator, if any
 */
export function validateField<Field extends string>(
  schema: RecordSchema<Field>,
  field: Field,
  value: unknown
): unknown {
  const { validator } = schema;
  if (!validator) return value;

  const accepted = validator(field, value);
  if (accepted === undefined && config.warnOnUndefinedValidation) {
    warnUndefinedOnce(schema, field);
  }
  return accepted;
}

/**
 * Resolve constructor arguments into a value buffer.
 *
 * Every field is written first, in declared order (positional value, else
 * default, else null); named values are then written in the caller's order.
 * Each write goes through the validator.
 */
export function resolveValues<Field extends string>(
  schema: RecordSchema<Field>,
  args: readonly unknown[]
): unknown[] {
  const { positional, namedEntries } = splitArguments(args);
  const received = positional.length + namedEntries.length;

  if (received > schema.fields.length) {
    throw new ArityError(schema.name, schema.fields.length, received);
  }

  const values = schema.fields.map((field, index) => {
    let candidate: unknown = ABSENT;
    if (index < positional.length) {
      candidate = positional[index];
    } else if (index < schema.defaults.length) {
      candidate = schema.defaults[index];
    }
    return validateField(schema, field, candidate);
  });

  for (const [field, value] of namedEntries) {
    const index = schema.positions.get(field);
    if (index === undefined) {
      throw new UnknownFieldError(schema.name, field);
    }
    values[index] = validateField(schema, schema.fields[index], value);
  }

  return values;
}
