/**
 * Resolve {{varName}} and {{env.NAME}} expressions in a value.
 * Works recursively on strings, arrays, and plain objects.
 * Unresolvable expressions are left as-is so callers can report them.
 */
export function resolveTemplate(
  value: unknown,
  vars: Record<string, string>,
  env: NodeJS.ProcessEnv = {},
): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{([^}]+)\}\}/g, (match, expr: string) => {
      const trimmed = expr.trim();

      const envMatch = /^env\.([A-Za-z_][A-Za-z0-9_]*)$/.exec(trimmed);
      if (envMatch) {
        const name = envMatch[1] ?? '';
        return env[name] ?? match;
      }

      return vars[trimmed] ?? match;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveTemplate(item, vars, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveTemplate(v, vars, env);
    }
    return result;
  }

  return value;
}

/** Whether any string in the value uses {{name}}. */
export function referencesVariable(value: unknown, name: string): boolean {
  if (typeof value === 'string') {
    for (const match of value.matchAll(/\{\{([^}]+)\}\}/g)) {
      if (match[1]?.trim() === name) return true;
    }
    return false;
  }
  if (Array.isArray(value)) return value.some((item) => referencesVariable(item, name));
  if (value !== null && typeof value === 'object') {
    return Object.values(value).some((v) => referencesVariable(v, name));
  }
  return false;
}

/**
 * Dotted paths of every string that still contains a template expression.
 */
export function findUnresolved(value: unknown, path = ''): string[] {
  if (typeof value === 'string') {
    return /\{\{[^}]+\}\}/.test(value) ? [path || '(root)'] : [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => findUnresolved(item, `${path}[${i}]`));
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).flatMap(([k, v]) =>
      findUnresolved(v, path ? `${path}.${k}` : k),
    );
  }
  return [];
}
