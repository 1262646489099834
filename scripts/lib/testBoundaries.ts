import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';

export const TEST_SUPPORT_PACKAGE = '@profile-chat/test-support';

/** Directories whose files may import the test-support package. */
export const BOUNDARY_ALLOWLIST = ['packages/test-support', 'tests'];

const IGNORED_DIRS = new Set(['node_modules', '.next', 'dist', 'coverage']);

const IMPORT_PATTERNS = [
  new RegExp(`from ['"]${TEST_SUPPORT_PACKAGE}(?:/[^'"]*)?['"]`),
  new RegExp(`import\\(['"]${TEST_SUPPORT_PACKAGE}(?:/[^'"]*)?['"]\\)`),
];

export type BoundaryViolation = { file: string; line: number; snippet: string };

export function isBoundaryAllowed(relativePath: string): boolean {
  const normalized = relativePath.split(path.sep).join('/');
  return BOUNDARY_ALLOWLIST.some((allowed) => normalized === allowed || normalized.startsWith(`${allowed}/`));
}

export function findTestSupportImports(file: string, source: string): BoundaryViolation[] {
  const violations: BoundaryViolation[] = [];
  source.split(/\r?\n/).forEach((line, index) => {
    if (IMPORT_PATTERNS.some((pattern) => pattern.test(line))) {
      violations.push({ file, line: index + 1, snippet: line.trim() });
    }
  });
  return violations;
}

async function listSourceFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  const files: string[] = [];
  for (const entry of entries) {
    if (IGNORED_DIRS.has(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSourceFiles(fullPath)));
    } else if (entry.isFile() && /\.tsx?$/.test(entry.name)) {
      files.push(fullPath);
    }
  }
  return files;
}

export async function collectBoundaryViolations(root: string, scanRoots = ['src', 'packages']): Promise<BoundaryViolation[]> {
  const violations: BoundaryViolation[] = [];
  for (const scanRoot of scanRoots) {
    for (const file of await listSourceFiles(path.join(root, scanRoot))) {
      const relative = path.relative(root, file);
      if (isBoundaryAllowed(relative)) continue;
      violations.push(...findTestSupportImports(relative, await readFile(file, 'utf8')));
    }
  }
  return violations;
}
