import { createRequire } from 'module';

const require = createRequire(import.meta.url);

interface PackageManifest {
  name: string;
  version: string;
}

function isManifest(value: unknown): value is PackageManifest {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

// Sources run from src/, the build from dist/src/
function readVersion(): string {
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const manifest: unknown = require(candidate);
      if (isManifest(manifest) && manifest.name === 'tapcalc') {
        return manifest.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

export const TAPCALC_VERSION: string = readVersion();
