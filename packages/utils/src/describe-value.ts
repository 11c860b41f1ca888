/**
 * Render a value as `[typeName, rendered]` for error messages.
 *
 * `describeValue(42)` → `['number', '42']`, `describeValue([1])` → `['Array', '[1]']`
 */
export function describeValue(value: unknown): [string, string] {
  if (value === null) {
    return ['null', 'null'];
  }

  switch (typeof value) {
    case 'undefined':
      return ['undefined', 'undefined'];
    case 'string':
      return ['string', JSON.stringify(value)];
    case 'bigint':
      return ['bigint', `${value.toString()}n`];
    case 'symbol':
      return ['symbol', value.toString()];
    case 'function':
      return ['function', `[Function ${value.name || 'anonymous'}]`];
    case 'object':
      return [typeNameOf(value), renderObject(value)];
    default:
      return [typeof value, String(value)];
  }
}

function typeNameOf(value: object): string {
  if (Array.isArray(value)) {
    return 'Array';
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null) {
    return 'Object';
  }
  return value.constructor?.name || 'Object';
}

function renderObject(value: object): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Cyclic or BigInt-bearing structures
    return String(value);
  }
}
