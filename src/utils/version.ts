import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

function getPackageVersion(): string {
  // src/utils and dist/utils both sit two levels below the package root
  const candidates = [
    join(__dirname, '..', '..', 'package.json'),
    join(process.cwd(), 'package.json'),
  ];

  for (const packagePath of candidates) {
    if (!existsSync(packagePath)) continue;
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      // unreadable package.json, try the next candidate
      continue;
    }
  }

  return '0.1.0';
}

export const PACKAGE_VERSION = getPackageVersion();
