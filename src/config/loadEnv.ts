import fs from 'fs';
import path from 'path';

// Minimal .env loader; existing process.env values always win.
export function parseEnvLine(line: string): { key: string; value: string } | null {
  const body = line.replace(/^export\s+/, '');
  const idx = body.indexOf('=');
  if (idx <= 0) return null;
  const key = body.slice(0, idx).trim();
  let value = body.slice(idx + 1).trim();
  const quoted = (value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"));
  if (quoted && value.length >= 2) {
    value = value.slice(1, -1);
  } else {
    value = value.replace(/\s+#.*$/, '');
  }
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(key) ? { key, value } : null;
}

/** Loads `customPath` (default .env in cwd) into `env`; returns the keys that were set. */
export function loadEnv(customPath?: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = path.resolve(process.cwd(), customPath || '.env');
  if (!fs.existsSync(envPath)) return [];
  const loaded: string[] = [];
  for (const raw of fs.readFileSync(envPath, 'utf-8').split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const kv = parseEnvLine(line);
    if (kv && !(kv.key in env)) {
      env[kv.key] = kv.value;
      loaded.push(kv.key);
    }
  }
  return loaded;
}
