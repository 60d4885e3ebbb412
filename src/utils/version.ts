import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Reads the version from the package.json two levels above this file,
 * which is the project root for both src/utils and dist/utils.
 */
function getPackageVersion(): string {
  try {
    const packagePath = join(__dirname, '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson !== 'object' ||
      packageJson === null ||
      !('version' in packageJson) ||
      typeof packageJson.version !== 'string'
    ) {
      throw new Error('Version not found in package.json');
    }

    return packageJson.version;
  } catch (error) {
    console.warn(
      'Could not read version from package.json, using fallback:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    return '0.1.0';
  }
}

export const PACKAGE_VERSION = getPackageVersion();
