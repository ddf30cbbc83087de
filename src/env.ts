import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse dotenv-style text into key/value pairs.
 *
 * Accepts `KEY=VALUE` and `export KEY=VALUE`; skips comments and blank lines;
 * strips matching surrounding quotes and, for unquoted values, a trailing
 * ` # comment`.
 */
export function parseEnvText(raw: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    if (trimmed.startsWith('export ')) trimmed = trimmed.slice('export '.length).trim();

    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();
    if (!key) continue;

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    } else {
      const hash = value.indexOf(' #');
      if (hash !== -1) value = value.slice(0, hash).trimEnd();
    }

    out[key] = value;
  }

  return out;
}

/** Load .env files from `cwd` without overriding keys already present in `target`. */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    const pairs = parseEnvText(readFileSync(filePath, 'utf8'));
    for (const [key, value] of Object.entries(pairs)) {
      if (target[key] === undefined) target[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}
