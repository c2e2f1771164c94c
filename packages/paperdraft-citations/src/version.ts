import { readFileSync } from 'node:fs';

const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url);

export const getPackageVersion = (): string => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      const { version } = pkg;
      if (typeof version === 'string' && version.trim().length > 0) {
        return version;
      }
    }
  } catch {
    // Missing or unreadable package.json: report the fallback version.
  }

  return '0.0.0';
};
