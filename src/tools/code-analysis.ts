import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { ToolExecutionError } from '../core/errors.js';
import {
  IGNORED_DIRECTORIES,
  optionalBoolean,
  optionalInteger,
  optionalString,
  requireString,
  resolveWorkspacePath,
} from './arguments.js';
import type { Tool } from './types.js';

const DEFAULT_TREE_DEPTH = 5;
const MAX_TREE_DEPTH = 10;
const MAX_TREE_ENTRIES = 500;
const MAX_SYMBOL_FILES = 5_000;
const TREE_SKIPPED_NAMES = new Set([
  '.git',
  'node_modules',
  '__pycache__',
  '.venv',
  'venv',
  'dist',
  'build',
  'coverage',
  '.idea',
  '.vscode',
  '.DS_Store',
]);

async function requireDirectory(toolName: string, inputPath: string, workingDir: string): Promise<string> {
  const absolutePath = resolveWorkspacePath(toolName, inputPath, workingDir);
  const info = await stat(absolutePath).catch(() => null);
  if (!info) {
    throw new ToolExecutionError(toolName, `Path does not exist: ${inputPath}`);
  }
  if (!info.isDirectory()) {
    throw new ToolExecutionError(toolName, `Path is not a directory: ${inputPath}`);
  }
  return absolutePath;
}

interface TreeWalk {
  maxDepth: number;
  showHidden: boolean;
  entries: number;
  truncated: boolean;
}

async function renderTree(dir: string, prefix: string, depth: number, walk: TreeWalk): Promise<string[]> {
  if (depth > walk.maxDepth || walk.truncated) {
    return [];
  }

  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch {
    return [`${prefix}[permission denied]`];
  }
  const visible = dirents
    .filter((entry) => !TREE_SKIPPED_NAMES.has(entry.name) && (walk.showHidden || !entry.name.startsWith('.')))
    .sort((a, b) => Number(b.isDirectory()) - Number(a.isDirectory()) || a.name.toLowerCase().localeCompare(b.name.toLowerCase()));

  const lines: string[] = [];
  for (const [idx, entry] of visible.entries()) {
    if (walk.entries >= MAX_TREE_ENTRIES) {
      walk.truncated = true;
      lines.push(`${prefix}... (truncated, max entries reached)`);
      break;
    }
    walk.entries++;

    const isLast = idx === visible.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    if (entry.isDirectory()) {
      lines.push(`${prefix}${connector}${entry.name}/`);
      const nested = await renderTree(path.join(dir, entry.name), `${prefix}${isLast ? '    ' : '│   '}`, depth + 1, walk);
      lines.push(...nested);
    } else {
      lines.push(`${prefix}${connector}${entry.name}`);
    }
  }
  return lines;
}

function buildTreeTool(): Tool {
  return {
    name: 'tree',
    description:
      'Show a directory as a tree, directories first. Skips node_modules, .git, build output and hidden entries ' +
      'unless show_hidden is set. Useful for getting a feel for a project layout.',
    parameters: [
      { name: 'path', type: 'string', description: 'Directory to show (default: working directory)', required: false },
      {
        name: 'max_depth',
        type: 'integer',
        description: `How deep to descend (max ${MAX_TREE_DEPTH})`,
        required: false,
        default: DEFAULT_TREE_DEPTH,
      },
      { name: 'show_hidden', type: 'boolean', description: 'Include dotfiles', required: false, default: false },
    ],
    async execute(args, context) {
      const inputPath = optionalString(args, 'path') ?? '.';
      const root = await requireDirectory('tree', inputPath, context.workingDir);
      const walk: TreeWalk = {
        maxDepth: Math.min(MAX_TREE_DEPTH, Math.max(1, optionalInteger(args, 'max_depth', DEFAULT_TREE_DEPTH))),
        showHidden: optionalBoolean(args, 'show_hidden'),
        entries: 0,
        truncated: false,
      };

      const lines = [`${path.basename(root)}/`, ...(await renderTree(root, '', 1, walk))];
      if (walk.truncated) {
        lines.push('', `(Showing ${MAX_TREE_ENTRIES} of potentially more entries)`);
      }
      return lines.join('\n');
    },
  };
}

interface DefinitionPattern {
  kind: string;
  /** Regex source with `{symbol}` standing for the escaped name. */
  source: string;
}

const EXPORT = '(export\\s+)?(default\\s+)?';
const SCRIPT_PATTERNS: DefinitionPattern[] = [
  { kind: 'function', source: `^\\s*${EXPORT}(async\\s+)?function\\*?\\s+{symbol}\\s*[<(]` },
  { kind: 'class', source: `^\\s*${EXPORT}(abstract\\s+)?class\\s+{symbol}\\b` },
  { kind: 'interface', source: '^\\s*(export\\s+)?interface\\s+{symbol}\\b' },
  { kind: 'type', source: '^\\s*(export\\s+)?type\\s+{symbol}\\s*[<=]' },
  { kind: 'enum', source: '^\\s*(export\\s+)?(const\\s+)?enum\\s+{symbol}\\b' },
  { kind: 'arrow function', source: '^\\s*(export\\s+)?(const|let|var)\\s+{symbol}\\s*=\\s*(async\\s+)?(\\(|\\w+\\s*=>)' },
  { kind: 'variable', source: '^\\s*(export\\s+)?(const|let|var)\\s+{symbol}\\s*[=:]' },
];

const DEFINITION_PATTERNS: Record<string, DefinitionPattern[]> = {
  '.ts': SCRIPT_PATTERNS,
  '.tsx': SCRIPT_PATTERNS,
  '.mts': SCRIPT_PATTERNS,
  '.cts': SCRIPT_PATTERNS,
  '.js': SCRIPT_PATTERNS,
  '.jsx': SCRIPT_PATTERNS,
  '.mjs': SCRIPT_PATTERNS,
  '.cjs': SCRIPT_PATTERNS,
  '.py': [
    { kind: 'function', source: '^\\s*(async\\s+)?def\\s+{symbol}\\s*\\(' },
    { kind: 'class', source: '^\\s*class\\s+{symbol}\\s*[:(]' },
    { kind: 'variable', source: '^{symbol}\\s*(:[^=]+)?=' },
  ],
  '.go': [
    { kind: 'function', source: '^\\s*func\\s+{symbol}\\s*[\\[(]' },
    { kind: 'method', source: '^\\s*func\\s+\\([^)]+\\)\\s+{symbol}\\s*\\(' },
    { kind: 'type', source: '^\\s*type\\s+{symbol}\\s' },
  ],
  '.rs': [
    { kind: 'function', source: '^\\s*(pub(\\([^)]*\\))?\\s+)?(async\\s+)?fn\\s+{symbol}\\s*[<(]' },
    { kind: 'struct', source: '^\\s*(pub(\\([^)]*\\))?\\s+)?struct\\s+{symbol}\\b' },
    { kind: 'enum', source: '^\\s*(pub(\\([^)]*\\))?\\s+)?enum\\s+{symbol}\\b' },
    { kind: 'trait', source: '^\\s*(pub(\\([^)]*\\))?\\s+)?trait\\s+{symbol}\\b' },
  ],
  '.java': [
    { kind: 'class', source: '^\\s*((public|private|protected|abstract|final|static)\\s+)*class\\s+{symbol}\\b' },
    { kind: 'interface', source: '^\\s*((public|private|protected)\\s+)?interface\\s+{symbol}\\b' },
    { kind: 'enum', source: '^\\s*((public|private|protected)\\s+)?enum\\s+{symbol}\\b' },
  ],
};

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileDefinitions(symbol: string, patterns: DefinitionPattern[]) {
  const escaped = escapeRegex(symbol);
  return patterns.map((pattern) => ({ kind: pattern.kind, regex: new RegExp(pattern.source.replace('{symbol}', () => escaped)) }));
}

function parseExtensions(raw: string | undefined): string[] {
  if (!raw) {
    return Object.keys(DEFINITION_PATTERNS);
  }
  return raw
    .split(',')
    .map((ext) => ext.trim())
    .filter(Boolean)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
    .filter((ext) => ext in DEFINITION_PATTERNS);
}

function buildFindSymbolTool(): Tool {
  return {
    name: 'find_symbol',
    description:
      'Find where a function, class, type or variable is defined. Returns path:line with the kind of definition. ' +
      'Understands TypeScript, JavaScript, Python, Go, Rust and Java.',
    parameters: [
      { name: 'symbol', type: 'string', description: 'Name to look up' },
      { name: 'path', type: 'string', description: 'Directory to search (default: working directory)', required: false },
      { name: 'file_types', type: 'string', description: "Comma-separated extensions, e.g. '.ts,.py'", required: false },
    ],
    async execute(args, context) {
      const symbol = requireString('find_symbol', args, 'symbol').trim();
      if (!/^[A-Za-z_$][\w$]*$/.test(symbol)) {
        throw new ToolExecutionError('find_symbol', `symbol must be a plain identifier, got '${symbol}'.`);
      }
      const inputPath = optionalString(args, 'path') ?? '.';
      const root = await requireDirectory('find_symbol', inputPath, context.workingDir);
      const extensions = parseExtensions(optionalString(args, 'file_types'));
      if (extensions.length === 0) {
        throw new ToolExecutionError('find_symbol', 'None of the requested file types are supported.');
      }

      const files = await fg(extensions.map((ext) => `**/*${ext}`), {
        cwd: root,
        onlyFiles: true,
        ignore: IGNORED_DIRECTORIES,
      });
      files.sort();

      const findings: string[] = [];
      for (const file of files.slice(0, MAX_SYMBOL_FILES)) {
        const patterns = DEFINITION_PATTERNS[path.extname(file)];
        if (!patterns) {
          continue;
        }
        const definitions = compileDefinitions(symbol, patterns);
        const content = await readFile(path.join(root, file), 'utf8').catch(() => '');
        content.split('\n').forEach((line, idx) => {
          const match = definitions.find((definition) => definition.regex.test(line));
          if (match) {
            findings.push(`${file}:${idx + 1} (${match.kind})\n  ${line.trim()}`);
          }
        });
      }

      if (findings.length === 0) {
        return `No definitions found for '${symbol}' in ${inputPath}`;
      }
      return `Found ${findings.length} definition(s) for '${symbol}':\n\n${findings.join('\n\n')}`;
    },
  };
}

const LANGUAGE_EXTENSIONS: Record<string, string[]> = {
  TypeScript: ['.ts', '.tsx', '.mts', '.cts'],
  JavaScript: ['.js', '.jsx', '.mjs', '.cjs'],
  Python: ['.py', '.pyi'],
  Go: ['.go'],
  Rust: ['.rs'],
  Java: ['.java'],
  'C/C++': ['.c', '.cc', '.cpp', '.h', '.hpp'],
  Ruby: ['.rb'],
  Shell: ['.sh', '.bash', '.zsh'],
  HTML: ['.html', '.htm'],
  CSS: ['.css', '.scss', '.sass', '.less'],
  SQL: ['.sql'],
  JSON: ['.json'],
  YAML: ['.yaml', '.yml'],
  Markdown: ['.md', '.markdown'],
};

interface LanguageStats {
  files: number;
  lines: number;
  code: number;
  blank: number;
  size: number;
}

export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

function statsRow(label: string, stats: LanguageStats): string {
  return [
    label.padEnd(15),
    String(stats.files).padStart(8),
    String(stats.lines).padStart(10),
    String(stats.code).padStart(10),
    String(stats.blank).padStart(8),
  ].join(' ');
}

function buildCodeStatsTool(): Tool {
  const languageByExtension = new Map<string, string>();
  for (const [language, extensions] of Object.entries(LANGUAGE_EXTENSIONS)) {
    for (const ext of extensions) {
      languageByExtension.set(ext, language);
    }
  }

  return {
    name: 'code_stats',
    description: 'Count files and lines of code per language, plus total size.',
    parameters: [
      { name: 'path', type: 'string', description: 'Directory to analyze (default: working directory)', required: false },
    ],
    async execute(args, context) {
      const inputPath = optionalString(args, 'path') ?? '.';
      const root = await requireDirectory('code_stats', inputPath, context.workingDir);
      const files = await fg('**/*', { cwd: root, onlyFiles: true, ignore: IGNORED_DIRECTORIES });

      const byLanguage = new Map<string, LanguageStats>();
      const total: LanguageStats = { files: 0, lines: 0, code: 0, blank: 0, size: 0 };
      for (const file of files) {
        const language = languageByExtension.get(path.extname(file).toLowerCase());
        if (!language) {
          continue;
        }
        const content = await readFile(path.join(root, file), 'utf8').catch(() => '');
        const lines = content.length === 0 ? [] : content.replace(/\n$/, '').split('\n');
        const blank = lines.filter((line) => line.trim().length === 0).length;
        const size = Buffer.byteLength(content, 'utf8');

        const stats = byLanguage.get(language) ?? { files: 0, lines: 0, code: 0, blank: 0, size: 0 };
        for (const target of [stats, total]) {
          target.files += 1;
          target.lines += lines.length;
          target.code += lines.length - blank;
          target.blank += blank;
          target.size += size;
        }
        byLanguage.set(language, stats);
      }

      if (total.files === 0) {
        return `No source files found in ${inputPath}`;
      }

      const rule = '-'.repeat(60);
      const rows = [...byLanguage.entries()]
        .sort((a, b) => b[1].code - a[1].code || a[0].localeCompare(b[0]))
        .map(([language, stats]) => statsRow(language, stats));
      return [
        `Code Statistics for: ${path.basename(root)}/`,
        '='.repeat(60),
        '',
        [
          'Language'.padEnd(15),
          'Files'.padStart(8),
          'Lines'.padStart(10),
          'Code'.padStart(10),
          'Blank'.padStart(8),
        ].join(' '),
        rule,
        ...rows,
        rule,
        statsRow('TOTAL', total),
        '',
        `Total size: ${formatSize(total.size)}`,
      ].join('\n');
    },
  };
}

export function createCodeAnalysisTools(): Tool[] {
  return [buildTreeTool(), buildFindSymbolTool(), buildCodeStatsTool()];
}
