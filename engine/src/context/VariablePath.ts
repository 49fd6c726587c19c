/**
 * Dotted-path access into the shared variable store.
 *
 * `review.score` reads variable `review`, then its `score` property.
 * Array elements are addressed by numeric segments (`items.0.name`).
 *
 * @module context
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dotted path; `undefined` when any segment is missing
 */
export function resolvePath(variables: Readonly<Record<string, unknown>>, path: string): unknown {
  const [head, ...rest] = path.split('.');
  if (head === undefined || !Object.prototype.hasOwnProperty.call(variables, head)) {
    return undefined;
  }

  let current: unknown = variables[head];
  for (const segment of rest) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * Replace `{{path}}` placeholders in a string.
 * A string that is exactly one placeholder yields the raw value (type-preserving).
 */
export function interpolate(template: string, variables: Readonly<Record<string, unknown>>): unknown {
  const whole = /^\{\{\s*([\w.]+)\s*\}\}$/.exec(template);
  if (whole?.[1] !== undefined) {
    return resolvePath(variables, whole[1]);
  }

  return template.replace(/\{\{\s*([\w.]+)\s*\}\}/g, (_match, path: string) => {
    const value = resolvePath(variables, path);
    if (value === undefined || value === null) {
      return '';
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}

/**
 * Interpolate every string inside a JSON-like value
 */
export function interpolateDeep(value: unknown, variables: Readonly<Record<string, unknown>>): unknown {
  if (typeof value === 'string') {
    return interpolate(value, variables);
  }
  if (Array.isArray(value)) {
    return value.map(item => interpolateDeep(item, variables));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateDeep(item, variables);
    }
    return result;
  }
  return value;
}
