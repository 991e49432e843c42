/**
 * Resolve environment variables in a string.
 *
 * Supports `${VAR_NAME}` and `${VAR_NAME:-fallback}`; an unset variable
 * without a fallback is an error.
 */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g, (_match, varName: string, fallback?: string) => {
    const envValue = env[varName];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`Environment variable "${varName}" is not set`);
  });
}

/**
 * Recursively resolve environment variables in every string of a parsed
 * YAML document
 */
export function resolveEnvRecursive(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, resolveEnvRecursive(item, env)]));
  }

  return value;
}
