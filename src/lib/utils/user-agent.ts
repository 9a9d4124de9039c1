import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
  homepage: string;
}

let cachedPkg: PackageInfo | null = null;

function readPackageJson(path: string): Partial<PackageInfo> | null {
  try {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!raw || typeof raw !== 'object') return null;
    return {
      name: 'name' in raw && typeof raw.name === 'string' ? raw.name : undefined,
      version: 'version' in raw && typeof raw.version === 'string' ? raw.version : undefined,
      homepage: 'homepage' in raw && typeof raw.homepage === 'string' ? raw.homepage : undefined,
    };
  } catch {
    return null;
  }
}

/**
 * Load and cache package.json metadata (best-effort).
 * Works from both src/lib/utils and dist/lib/utils.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = {
    name: 'acme-dns-metaname',
    version: '0.0.0-dev',
    homepage: 'https://metaname.net/api/1.1/doc',
  };

  const candidates = [
    join(__dirname, '..', '..', '..', 'package.json'),
    join(__dirname, '..', '..', 'package.json'),
  ];

  for (const candidate of candidates) {
    const raw = readPackageJson(candidate);
    if (raw?.name) {
      cachedPkg = {
        name: raw.name,
        version: raw.version || defaults.version,
        homepage: raw.homepage || defaults.homepage,
      };
      return cachedPkg;
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build a standardized User-Agent string for outbound API calls */
export function buildUserAgent(): string {
  const { name, version, homepage } = getPackageInfo();
  return `${name}/${version} (+${homepage}; Node/${process.version.replace(/^v/, '')})`;
}
