import { readFileSync } from 'fs';
import { resolve } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from src/ and from dist/src/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = {
    name: 'acme-authorizer',
    version: '0.0.0-dev',
  };

  const candidates = [
    '../../../package.json', // from src/lib/utils/
    '../../../../package.json', // from dist/src/lib/utils/
  ];

  for (const rel of candidates) {
    let raw: { name?: unknown; version?: unknown };
    try {
      raw = JSON.parse(readFileSync(resolve(__dirname, rel), 'utf-8'));
    } catch {
      continue;
    }
    cachedPkg = {
      name: typeof raw.name === 'string' ? raw.name : defaults.name,
      version: typeof raw.version === 'string' ? raw.version : defaults.version,
    };
    return cachedPkg;
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build the User-Agent string for outbound CA calls */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
