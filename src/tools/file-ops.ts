import { copyFile, cp, lstat, mkdir, rename, rm, rmdir } from 'node:fs/promises';
import path from 'node:path';
import { ToolExecutionError, errorMessage } from '../core/errors.js';
import { optionalBoolean, requireString, resolveWorkspacePath } from './arguments.js';
import type { Tool } from './types.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function failure(toolName: string, verb: string, displayPath: string, error: unknown): ToolExecutionError {
  const code = errorCode(error);
  if (code === 'EACCES' || code === 'EPERM') {
    return new ToolExecutionError(toolName, `Permission denied: ${displayPath}`);
  }
  return new ToolExecutionError(toolName, `Failed to ${verb}: ${errorMessage(error)}`);
}

function resolveTarget(toolName: string, inputPath: string, workingDir: string): string {
  const absolutePath = resolveWorkspacePath(toolName, inputPath, workingDir);
  if (absolutePath === path.resolve(workingDir)) {
    throw new ToolExecutionError(toolName, 'Refusing to operate on the working directory itself.');
  }
  return absolutePath;
}

function buildDeleteTool(): Tool {
  return {
    name: 'delete',
    description:
      'Delete a file or directory. Non-empty directories need recursive=true. This cannot be undone.',
    parameters: [
      { name: 'path', type: 'string', description: 'File or directory to delete' },
      {
        name: 'recursive',
        type: 'boolean',
        description: 'Delete a directory and everything in it',
        required: false,
        default: false,
      },
    ],
    async execute(args, context) {
      const target = requireString('delete', args, 'path');
      const absolutePath = resolveTarget('delete', target, context.workingDir);
      const info = await lstat(absolutePath).catch(() => null);
      if (!info) {
        throw new ToolExecutionError('delete', `Path does not exist: ${target}`);
      }

      if (!info.isDirectory()) {
        await rm(absolutePath).catch((error: unknown) => {
          throw failure('delete', 'delete', target, error);
        });
        return `Deleted file: ${target}`;
      }

      if (optionalBoolean(args, 'recursive')) {
        await rm(absolutePath, { recursive: true }).catch((error: unknown) => {
          throw failure('delete', 'delete', target, error);
        });
        return `Deleted directory and contents: ${target}`;
      }

      try {
        await rmdir(absolutePath);
      } catch (error) {
        if (errorCode(error) === 'ENOTEMPTY' || errorCode(error) === 'EEXIST') {
          throw new ToolExecutionError('delete', `Directory not empty. Use recursive=true to delete: ${target}`);
        }
        throw failure('delete', 'delete', target, error);
      }
      return `Deleted empty directory: ${target}`;
    },
  };
}

function buildCopyTool(): Tool {
  return {
    name: 'copy',
    description: 'Copy a file or directory. Missing parent directories of the destination are created.',
    parameters: [
      { name: 'source', type: 'string', description: 'File or directory to copy' },
      { name: 'destination', type: 'string', description: 'Where the copy goes' },
    ],
    async execute(args, context) {
      const source = requireString('copy', args, 'source');
      const destination = requireString('copy', args, 'destination');
      const sourcePath = resolveTarget('copy', source, context.workingDir);
      const destinationPath = resolveTarget('copy', destination, context.workingDir);

      const info = await lstat(sourcePath).catch(() => null);
      if (!info) {
        throw new ToolExecutionError('copy', `Source does not exist: ${source}`);
      }

      try {
        await mkdir(path.dirname(destinationPath), { recursive: true });
        if (!info.isDirectory()) {
          await copyFile(sourcePath, destinationPath);
          return `Copied file: ${source} -> ${destination}`;
        }
        if (await lstat(destinationPath).catch(() => null)) {
          throw new ToolExecutionError('copy', `Destination already exists: ${destination}`);
        }
        await cp(sourcePath, destinationPath, { recursive: true, errorOnExist: true, force: false });
        return `Copied directory: ${source} -> ${destination}`;
      } catch (error) {
        if (error instanceof ToolExecutionError) {
          throw error;
        }
        throw failure('copy', 'copy', destination, error);
      }
    },
  };
}

function buildMoveTool(): Tool {
  return {
    name: 'move',
    description: 'Move or rename a file or directory. Missing parent directories of the destination are created.',
    parameters: [
      { name: 'source', type: 'string', description: 'File or directory to move' },
      { name: 'destination', type: 'string', description: 'New location' },
    ],
    async execute(args, context) {
      const source = requireString('move', args, 'source');
      const destination = requireString('move', args, 'destination');
      const sourcePath = resolveTarget('move', source, context.workingDir);
      const destinationPath = resolveTarget('move', destination, context.workingDir);

      if (!(await lstat(sourcePath).catch(() => null))) {
        throw new ToolExecutionError('move', `Source does not exist: ${source}`);
      }

      try {
        await mkdir(path.dirname(destinationPath), { recursive: true });
        await rename(sourcePath, destinationPath);
      } catch (error) {
        throw failure('move', 'move', source, error);
      }
      return `Moved: ${source} -> ${destination}`;
    },
  };
}

function buildMkdirTool(): Tool {
  return {
    name: 'mkdir',
    description: 'Create a directory, including any missing parents.',
    parameters: [{ name: 'path', type: 'string', description: 'Directory to create' }],
    async execute(args, context) {
      const target = requireString('mkdir', args, 'path');
      const absolutePath = resolveWorkspacePath('mkdir', target, context.workingDir);

      const existing = await lstat(absolutePath).catch(() => null);
      if (existing?.isDirectory()) {
        return `Directory already exists: ${target}`;
      }
      if (existing) {
        throw new ToolExecutionError('mkdir', `Path exists but is not a directory: ${target}`);
      }

      await mkdir(absolutePath, { recursive: true }).catch((error: unknown) => {
        throw failure('mkdir', 'create directory', target, error);
      });
      return `Created directory: ${target}`;
    },
  };
}

export function createFileOpsTools(): Tool[] {
  return [buildDeleteTool(), buildCopyTool(), buildMoveTool(), buildMkdirTool()];
}
