function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

function convertKeysDeep(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => convertKeysDeep(item, convert));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      result[convert(key)] = convertKeysDeep(child, convert);
    }
    return result;
  }
  return value;
}

/**
 * Recursively rename object keys from snake_case to camelCase, e.g. for
 * YAML configuration files.
 */
export function toCamelCaseDeep(value: unknown): unknown {
  return convertKeysDeep(value, toCamelCase);
}
