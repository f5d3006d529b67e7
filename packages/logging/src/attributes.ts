export const BAD_KEY = '!BADKEY';

/**
 * A key/value pair attached to a log record, either per call or
 * permanently through Logger.with().
 */
export class Attribute {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
  ) {}
}

export function stringAttr(key: string, value: string): Attribute {
  return new Attribute(key, value);
}

export function anyAttr(key: string, value: unknown): Attribute {
  return new Attribute(key, value);
}

/**
 * Builds a nested group: the attributes end up under `key` as one object.
 */
export function groupAttr(key: string, ...attributes: unknown[]): Attribute {
  return new Attribute(key, collectAttributes(attributes));
}

/**
 * Flattens variadic log arguments into the object handed to pino.
 *
 * Each argument is either an Attribute or a string key followed by its
 * value. A key without a value, or any other stray argument, lands under
 * BAD_KEY.
 */
export function collectAttributes(args: readonly unknown[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg instanceof Attribute) {
      setField(fields, arg.key, renderValue(arg.value));
      i += 1;
    } else if (typeof arg === 'string') {
      if (i + 1 < args.length) {
        setField(fields, arg, renderValue(args[i + 1]));
        i += 2;
      } else {
        setField(fields, BAD_KEY, arg);
        i += 1;
      }
    } else {
      setField(fields, BAD_KEY, renderValue(arg));
      i += 1;
    }
  }

  return fields;
}

// Defined as own properties so keys such as "__proto__" are kept.
function setField(fields: Record<string, unknown>, key: string, value: unknown) {
  Object.defineProperty(fields, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function renderValue(value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}
