import { readFile, stat, writeFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { ToolExecutionError, errorMessage } from '../core/errors.js';
import type { ToolArguments } from '../core/types.js';
import {
  IGNORED_DIRECTORIES,
  optionalBoolean,
  optionalInteger,
  optionalString,
  requireString,
  resolveWorkspacePath,
} from './arguments.js';
import { createCodeAnalysisTools } from './code-analysis.js';
import { createFileOpsTools } from './file-ops.js';
import { createGitTools } from './git.js';
import { executeShell } from './shell.js';
import type { Tool, ToolExecutionContext } from './types.js';
import { createWebTools } from './web.js';

const DEFAULT_READ_LIMIT = 2_000;
const MAX_LINE_LENGTH = 2_000;
const DEFAULT_GLOB_RESULTS = 100;
const DEFAULT_GREP_RESULTS = 50;

async function readTextFile(toolName: string, absolutePath: string, displayPath: string): Promise<string> {
  const info = await stat(absolutePath).catch(() => null);
  if (!info) {
    throw new ToolExecutionError(toolName, `File not found: ${displayPath}`);
  }
  if (!info.isFile()) {
    throw new ToolExecutionError(toolName, `Not a file: ${displayPath}`);
  }

  try {
    return await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new ToolExecutionError(toolName, `Failed to read file: ${errorMessage(error)}`);
  }
}

function countLines(content: string): number {
  if (content.length === 0) {
    return 0;
  }
  return content.split('\n').length - (content.endsWith('\n') ? 1 : 0);
}

function lineNumberAt(content: string, index: number): number {
  return content.slice(0, index).split('\n').length;
}

function buildReadFileTool(): Tool {
  return {
    name: 'read_file',
    description:
      'Read a UTF-8 text file. Lines are returned with 1-based line numbers. ' +
      'Use offset and limit to page through large files.',
    parameters: [
      { name: 'file_path', type: 'string', description: 'Path to the file, relative to the working directory or absolute' },
      { name: 'offset', type: 'integer', description: 'Line number to start reading from (1-based)', required: false, default: 1 },
      { name: 'limit', type: 'integer', description: 'Maximum number of lines to return', required: false, default: DEFAULT_READ_LIMIT },
    ],
    async execute(args, context) {
      const filePath = requireString('read_file', args, 'file_path');
      const absolutePath = resolveWorkspacePath('read_file', filePath, context.workingDir);
      const content = await readTextFile('read_file', absolutePath, filePath);
      if (content.length === 0) {
        return `(empty file: ${filePath})`;
      }

      const lines = content.split('\n');
      if (content.endsWith('\n')) {
        lines.pop();
      }
      const offset = Math.max(1, optionalInteger(args, 'offset', 1));
      const limit = Math.max(1, optionalInteger(args, 'limit', DEFAULT_READ_LIMIT));
      if (offset > lines.length) {
        throw new ToolExecutionError('read_file', `offset ${offset} is past the end of the file (${lines.length} lines).`);
      }

      const selected = lines.slice(offset - 1, offset - 1 + limit);
      const width = String(offset - 1 + selected.length).length;
      const rendered = selected.map((line, idx) => {
        const text = line.length > MAX_LINE_LENGTH ? `${line.slice(0, MAX_LINE_LENGTH)}...` : line;
        return `${String(offset + idx).padStart(width, ' ')}\t${text}`;
      });

      const lastShown = offset - 1 + selected.length;
      if (lastShown < lines.length) {
        rendered.push('', `... (${lines.length - lastShown} more lines, continue with offset=${lastShown + 1})`);
      }
      return rendered.join('\n');
    },
  };
}

function buildWriteFileTool(): Tool {
  return {
    name: 'write_file',
    description:
      'Create a new file or overwrite an existing file with the given content. ' +
      'For modifying existing files, prefer edit_file.',
    parameters: [
      { name: 'file_path', type: 'string', description: 'Path where the file should be written' },
      { name: 'content', type: 'string', description: 'The content to write to the file' },
    ],
    async execute(args, context) {
      const filePath = requireString('write_file', args, 'file_path');
      const content = args.content;
      if (typeof content !== 'string') {
        throw new ToolExecutionError('write_file', 'content must be a string.');
      }
      const absolutePath = resolveWorkspacePath('write_file', filePath, context.workingDir);

      const parent = await stat(path.dirname(absolutePath)).catch(() => null);
      if (!parent?.isDirectory()) {
        throw new ToolExecutionError('write_file', `Parent directory does not exist: ${path.dirname(filePath)}`);
      }
      const existing = await stat(absolutePath).catch(() => null);
      if (existing?.isDirectory()) {
        throw new ToolExecutionError('write_file', `Cannot write to directory: ${filePath}`);
      }

      try {
        await writeFile(absolutePath, content, 'utf8');
      } catch (error) {
        throw new ToolExecutionError('write_file', `Failed to write file: ${errorMessage(error)}`);
      }

      const action = existing ? 'Wrote' : 'Created';
      return `${action} ${filePath} (${countLines(content)} lines, ${Buffer.byteLength(content, 'utf8')} bytes)`;
    },
  };
}

function buildEditFileTool(): Tool {
  return {
    name: 'edit_file',
    description:
      'Edit a file by replacing an exact string with a new string. old_string must match exactly, ' +
      'including whitespace, and must be unique unless replace_all is true. Read the file first.',
    parameters: [
      { name: 'file_path', type: 'string', description: 'Path to the file to edit' },
      { name: 'old_string', type: 'string', description: 'The exact text to find' },
      { name: 'new_string', type: 'string', description: 'The replacement text' },
      {
        name: 'replace_all',
        type: 'boolean',
        description: 'Replace every occurrence instead of requiring a unique match',
        required: false,
        default: false,
      },
    ],
    async execute(args, context) {
      const filePath = requireString('edit_file', args, 'file_path');
      const oldString = requireString('edit_file', args, 'old_string');
      const newString = args.new_string;
      if (typeof newString !== 'string') {
        throw new ToolExecutionError('edit_file', 'new_string must be a string.');
      }
      if (oldString === newString) {
        throw new ToolExecutionError('edit_file', 'old_string and new_string are identical. No changes made.');
      }

      const absolutePath = resolveWorkspacePath('edit_file', filePath, context.workingDir);
      const content = await readTextFile('edit_file', absolutePath, filePath);

      const positions: number[] = [];
      for (let idx = content.indexOf(oldString); idx !== -1; idx = content.indexOf(oldString, idx + 1)) {
        positions.push(idx);
      }

      if (positions.length === 0) {
        let reason = 'old_string not found in file.';
        if (content.includes(oldString.trim())) {
          reason += ' The text exists but whitespace does not match. Check indentation.';
        }
        throw new ToolExecutionError('edit_file', reason);
      }

      const replaceAll = optionalBoolean(args, 'replace_all');
      if (!replaceAll && positions.length > 1) {
        const lines = positions.map((pos) => `Line ${lineNumberAt(content, pos)}`).join(', ');
        throw new ToolExecutionError(
          'edit_file',
          `old_string appears ${positions.length} times at: ${lines}. ` +
            'Use replace_all=true or include more context to make it unique.',
        );
      }

      const updated = replaceAll ? content.split(oldString).join(newString) : content.replace(oldString, () => newString);
      await writeFile(absolutePath, updated, 'utf8');

      const count = replaceAll ? positions.length : 1;
      return `Edited ${filePath}: replaced ${count} occurrence${count === 1 ? '' : 's'}.`;
    },
  };
}

function buildListDirTool(): Tool {
  return {
    name: 'list_dir',
    description: 'List files and folders in a directory. Directories are shown with a trailing slash.',
    parameters: [
      { name: 'path', type: 'string', description: 'Directory to list (default: working directory)', required: false },
    ],
    async execute(args, context) {
      const dirPath = optionalString(args, 'path') ?? '.';
      const absolutePath = resolveWorkspacePath('list_dir', dirPath, context.workingDir);

      const entries = await readdir(absolutePath, { withFileTypes: true }).catch(() => null);
      if (!entries) {
        throw new ToolExecutionError('list_dir', `Directory not found: ${dirPath}`);
      }
      if (entries.length === 0) {
        return `(empty directory: ${dirPath})`;
      }

      return entries
        .map((entry) => `${entry.name}${entry.isDirectory() ? '/' : ''}`)
        .sort((a, b) => a.localeCompare(b))
        .join('\n');
    },
  };
}

async function resolveSearchRoot(toolName: string, args: ToolArguments, context: ToolExecutionContext) {
  const basePath = optionalString(args, 'path') ?? '.';
  const absolutePath = resolveWorkspacePath(toolName, basePath, context.workingDir);
  const info = await stat(absolutePath).catch(() => null);
  if (!info) {
    throw new ToolExecutionError(toolName, `Path not found: ${basePath}`);
  }
  return { absolutePath, isDirectory: info.isDirectory() };
}

function buildGlobTool(): Tool {
  return {
    name: 'glob',
    description:
      "Find files matching a glob pattern, such as '**/*.ts' for every TypeScript file " +
      "or '*.json' for JSON files in the base directory.",
    parameters: [
      { name: 'pattern', type: 'string', description: "Glob pattern to match (e.g. '**/*.ts')" },
      { name: 'path', type: 'string', description: 'Base directory to search from (default: working directory)', required: false },
      { name: 'max_results', type: 'integer', description: 'Maximum number of files to return', required: false, default: DEFAULT_GLOB_RESULTS },
      { name: 'include_hidden', type: 'boolean', description: 'Include dotfiles', required: false, default: false },
    ],
    async execute(args, context) {
      const pattern = requireString('glob', args, 'pattern');
      if (pattern.split('/').includes('..')) {
        throw new ToolExecutionError('glob', 'Pattern must not traverse above the base directory.');
      }
      const { absolutePath, isDirectory } = await resolveSearchRoot('glob', args, context);
      if (!isDirectory) {
        throw new ToolExecutionError('glob', `Not a directory: ${optionalString(args, 'path') ?? '.'}`);
      }
      const maxResults = Math.max(1, optionalInteger(args, 'max_results', DEFAULT_GLOB_RESULTS));

      const matches = await fg(pattern, {
        cwd: absolutePath,
        dot: optionalBoolean(args, 'include_hidden'),
        onlyFiles: true,
        ignore: IGNORED_DIRECTORIES,
      });
      if (matches.length === 0) {
        return `No files found matching pattern: ${pattern}`;
      }

      matches.sort();
      const shown = matches.slice(0, maxResults);
      const lines = [...shown];
      if (matches.length > shown.length) {
        lines.push('', `... (showing first ${shown.length} of ${matches.length} files)`);
      }
      return lines.join('\n');
    },
  };
}

function compilePattern(pattern: string, ignoreCase: boolean): RegExp {
  try {
    return new RegExp(pattern, ignoreCase ? 'i' : '');
  } catch (error) {
    throw new ToolExecutionError('grep', `Invalid regular expression: ${errorMessage(error)}`);
  }
}

function buildGrepTool(): Tool {
  return {
    name: 'grep',
    description:
      'Search file contents for a regular expression. Returns matching lines as path:line:text. ' +
      'Use it to find definitions, usages and config values.',
    parameters: [
      { name: 'pattern', type: 'string', description: 'Regular expression to search for' },
      { name: 'path', type: 'string', description: 'File or directory to search (default: working directory)', required: false },
      { name: 'include', type: 'string', description: "Glob filter for file names (e.g. '*.ts')", required: false },
      { name: 'ignore_case', type: 'boolean', description: 'Case-insensitive search', required: false, default: false },
      { name: 'max_results', type: 'integer', description: 'Maximum number of matching lines', required: false, default: DEFAULT_GREP_RESULTS },
    ],
    async execute(args, context) {
      const pattern = requireString('grep', args, 'pattern');
      const regex = compilePattern(pattern, optionalBoolean(args, 'ignore_case'));
      const maxResults = Math.max(1, optionalInteger(args, 'max_results', DEFAULT_GREP_RESULTS));
      const { absolutePath, isDirectory } = await resolveSearchRoot('grep', args, context);
      const rootDir = path.resolve(context.workingDir);

      let files: string[];
      if (isDirectory) {
        const include = optionalString(args, 'include');
        files = await fg(include ? `**/${include}` : '**/*', {
          cwd: absolutePath,
          absolute: true,
          onlyFiles: true,
          ignore: IGNORED_DIRECTORIES,
        });
        files.sort();
      } else {
        files = [absolutePath];
      }

      const results: string[] = [];
      let truncated = false;
      for (const file of files) {
        let content: string;
        try {
          content = await readFile(file, 'utf8');
        } catch {
          continue;
        }
        if (content.includes('\u0000')) {
          continue;
        }

        const displayPath = path.relative(rootDir, file) || path.basename(file);
        const lines = content.split('\n');
        for (let idx = 0; idx < lines.length; idx++) {
          if (!regex.test(lines[idx] ?? '')) {
            continue;
          }
          if (results.length >= maxResults) {
            truncated = true;
            break;
          }
          results.push(`${displayPath}:${idx + 1}:${lines[idx]}`);
        }
        if (truncated) {
          break;
        }
      }

      if (results.length === 0) {
        return `No matches found for pattern: ${pattern}`;
      }
      if (truncated) {
        results.push('', `... (showing first ${maxResults} results)`);
      }
      return results.join('\n');
    },
  };
}

function buildBashTool(): Tool {
  return {
    name: 'bash',
    description:
      'Execute a bash command in the working directory and return its output. ' +
      'Use for git, package managers, builds and tests. Prefer the file tools for reading and editing.',
    parameters: [
      { name: 'command', type: 'string', description: 'The bash command to execute' },
      { name: 'timeout', type: 'integer', description: 'Timeout in seconds (max 600)', required: false },
    ],
    async execute(args, context) {
      const command = requireString('bash', args, 'command');
      const timeoutSeconds = optionalInteger(args, 'timeout', 0);
      const timeoutMs = timeoutSeconds > 0 ? timeoutSeconds * 1000 : context.timeoutMs;

      const result = await executeShell(command, context.workingDir, { timeoutMs, signal: context.signal });
      if (result.blockedReason) {
        throw new ToolExecutionError('bash', result.output);
      }
      if (result.timedOut) {
        throw new ToolExecutionError('bash', `Command timed out after ${Math.round(timeoutMs / 1000)} seconds.`);
      }

      const output = result.output.length > 0 ? result.output : '(no output)';
      return result.exitCode === 0 ? output : `[Exit code: ${result.exitCode}]\n${output}`;
    },
  };
}

/** The standard tool set handed to a fresh agent loop. */
export function createBuiltinTools(): Tool[] {
  return [
    buildReadFileTool(),
    buildWriteFileTool(),
    buildEditFileTool(),
    buildListDirTool(),
    buildGlobTool(),
    buildGrepTool(),
    buildBashTool(),
    ...createFileOpsTools(),
    ...createCodeAnalysisTools(),
    ...createGitTools(),
    ...createWebTools(),
  ];
}
