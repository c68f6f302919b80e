import path from 'node:path';
import { ToolExecutionError } from '../core/errors.js';
import type { ToolArguments } from '../core/types.js';

/** Globs the search-style tools skip. */
export const IGNORED_DIRECTORIES = ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**', '**/.venv/**'];

export function requireString(toolName: string, args: ToolArguments, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ToolExecutionError(toolName, `${key} must be a non-empty string.`);
  }
  return value;
}

export function optionalString(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function optionalInteger(args: ToolArguments, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.floor(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return fallback;
}

export function optionalBoolean(args: ToolArguments, key: string): boolean {
  const value = args[key];
  return value === true || value === 'true';
}

/**
 * Resolve `inputPath` against the working directory and reject anything that
 * lands outside it.
 */
export function resolveWorkspacePath(toolName: string, inputPath: string, workingDir: string): string {
  const rootDir = path.resolve(workingDir);
  const resolved = path.resolve(rootDir, inputPath);
  const relative = path.relative(rootDir, resolved);

  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ToolExecutionError(
      toolName,
      `Access denied: Path '${inputPath}' resolves outside the working directory.`,
    );
  }
  return resolved;
}
