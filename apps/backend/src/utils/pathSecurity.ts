import path from 'node:path';

/**
 * Validate that a file path is within the allowed directory.
 * Resolves the path against `baseDir` and rejects anything that lands outside it.
 *
 * @param filePath Path to validate (can be relative or absolute)
 * @param baseDir Base directory that the path must be within
 * @returns Resolved absolute path if valid, throws error if invalid
 */
export function validatePathWithinDirectory(filePath: string, baseDir: string = process.cwd()): string {
  if (!filePath) {
    throw new Error('Invalid file path: must be a non-empty string');
  }

  const normalizedBaseDir = path.normalize(path.resolve(baseDir));
  const normalizedFilePath = path.normalize(path.resolve(baseDir, filePath));

  const relativePath = path.relative(normalizedBaseDir, normalizedFilePath);

  // If relative path starts with .., it's outside the base directory
  if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new Error(`Path traversal detected: ${filePath} resolves outside allowed directory ${baseDir}`);
  }

  return normalizedFilePath;
}
