import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';
import { configFileSchema } from './schema.js';
import type { LintConfig } from './schema.js';
import { ConfigError } from './errors.js';

/**
 * Validate an already-decoded override document.
 * Throws ConfigError describing every problem zod found.
 */
export function parseConfig(raw: unknown, source: string | null = null): LintConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid configuration\n${z.prettifyError(result.error)}`, source);
  }
  return result.data;
}

/**
 * Read, decode and validate an override document from disk.
 * A missing file, malformed JSON or a schema violation all raise ConfigError.
 */
export function loadConfigFile(filePath: string): LintConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read configuration (${reason})`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`configuration is not valid JSON (${reason})`, filePath);
  }

  return parseConfig(raw, filePath);
}
