import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError, type SecretSource } from './config.js';

/**
 * Resolve a secret from its literal value, an environment variable, or a
 * file (such as a mounted secret-manager volume). File contents are trimmed.
 */
export async function resolveSecret(source: SecretSource, label: string): Promise<string> {
  if (typeof source === 'string') return source;

  if ('env' in source) {
    const value = process.env[source.env];
    if (!value) {
      throw new ConfigError(`Missing required environment variable for ${label}: ${source.env}`);
    }
    return value;
  }

  const path = resolve(process.cwd(), source.file);
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read ${label} from ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const value = raw.trim();
  if (!value) {
    throw new ConfigError(`Secret file for ${label} is empty: ${path}`);
  }
  return value;
}
