/**
 * Option values that may point at an environment variable.
 *
 * `env:NAME` reads NAME from the loaded dotenv file first, then from the
 * process environment. Any other value is used literally.
 */
import type { DotenvDocument } from '../dotenv/index.js';

const ENV_PREFIX = 'env:';

export function isEnvReference(value: string): boolean {
  return value.startsWith(ENV_PREFIX) && value.length > ENV_PREFIX.length;
}

export function resolveEnvReference(
  value: string,
  document?: DotenvDocument,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (!isEnvReference(value)) {
    return value;
  }
  const name = value.slice(ENV_PREFIX.length);
  const resolved = document?.get(name) ?? env[name];
  if (resolved === undefined || resolved === '') {
    throw new Error(`'${name}' not found in environment`);
  }
  return resolved;
}
