import { ToolExecutionError } from '../core/errors.js';
import type { ToolArguments } from '../core/types.js';
import { optionalBoolean, optionalInteger, optionalString, requireString, resolveWorkspacePath } from './arguments.js';
import { executeShell } from './shell.js';
import type { Tool, ToolExecutionContext, ToolParameter } from './types.js';

const DEFAULT_LOG_COUNT = 10;
const GIT_TIMEOUT_MS = 30_000;

const REPO_PATH_PARAMETER: ToolParameter = {
  name: 'path',
  type: 'string',
  description: 'Repository directory (default: working directory)',
  required: false,
};

/** Single-quote a value for `bash -c`. */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function gitCommandLine(args: readonly string[]): string {
  return ['git', ...args.map(quoteShellArg)].join(' ');
}

interface GitOutcome {
  output: string;
  exitCode: number;
}

async function runGit(
  toolName: string,
  gitArgs: readonly string[],
  args: ToolArguments,
  context: ToolExecutionContext,
): Promise<GitOutcome> {
  const repoDir = resolveWorkspacePath(toolName, optionalString(args, 'path') ?? '.', context.workingDir);
  const timeoutMs = Math.min(context.timeoutMs, GIT_TIMEOUT_MS);
  const result = await executeShell(gitCommandLine(gitArgs), repoDir, { timeoutMs, signal: context.signal });

  if (result.timedOut) {
    throw new ToolExecutionError(toolName, `Git command timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
  if (result.exitCode === 127) {
    throw new ToolExecutionError(toolName, 'Git is not installed or not in PATH');
  }
  return { output: result.output.trim(), exitCode: result.exitCode };
}

function buildGitStatusTool(): Tool {
  return {
    name: 'git_status',
    description: 'Show the working tree status: current branch plus modified, staged and untracked files.',
    parameters: [REPO_PATH_PARAMETER],
    async execute(args, context) {
      const { output, exitCode } = await runGit('git_status', ['status', '--short', '--branch'], args, context);
      if (exitCode !== 0) {
        if (output.toLowerCase().includes('not a git repository')) {
          return 'Not a git repository';
        }
        throw new ToolExecutionError('git_status', output);
      }
      return output || 'Working tree clean, nothing to commit';
    },
  };
}

function buildGitDiffTool(): Tool {
  return {
    name: 'git_diff',
    description: 'Show unstaged changes, or staged changes with staged=true. Optionally limit to one file.',
    parameters: [
      REPO_PATH_PARAMETER,
      { name: 'file', type: 'string', description: 'Only diff this file', required: false },
      { name: 'staged', type: 'boolean', description: 'Show staged changes instead', required: false, default: false },
    ],
    async execute(args, context) {
      const staged = optionalBoolean(args, 'staged');
      const file = optionalString(args, 'file');
      const gitArgs = ['diff'];
      if (staged) {
        gitArgs.push('--cached');
      }
      if (file) {
        gitArgs.push('--', file);
      }

      const { output, exitCode } = await runGit('git_diff', gitArgs, args, context);
      if (exitCode !== 0) {
        throw new ToolExecutionError('git_diff', output);
      }
      return output || (staged ? 'No changes staged' : 'No changes');
    },
  };
}

function buildGitLogTool(): Tool {
  return {
    name: 'git_log',
    description: 'Show recent commit history.',
    parameters: [
      REPO_PATH_PARAMETER,
      { name: 'count', type: 'integer', description: 'Number of commits to show', required: false, default: DEFAULT_LOG_COUNT },
      { name: 'oneline', type: 'boolean', description: 'One line per commit', required: false, default: true },
    ],
    async execute(args, context) {
      const count = Math.max(1, optionalInteger(args, 'count', DEFAULT_LOG_COUNT));
      const gitArgs = ['log', `-${count}`];
      if (args.oneline === undefined || optionalBoolean(args, 'oneline')) {
        gitArgs.push('--oneline');
      }

      const { output, exitCode } = await runGit('git_log', gitArgs, args, context);
      if (exitCode !== 0) {
        if (output.toLowerCase().includes('does not have any commits')) {
          return 'No commits yet';
        }
        throw new ToolExecutionError('git_log', output);
      }
      return output || 'No commits';
    },
  };
}

function buildGitAddTool(): Tool {
  return {
    name: 'git_add',
    description: "Stage files for commit. Pass space-separated paths, or '.' for everything.",
    parameters: [
      { name: 'files', type: 'string', description: "Files to stage (space-separated, or '.')" },
      REPO_PATH_PARAMETER,
    ],
    async execute(args, context) {
      const files = requireString('git_add', args, 'files');
      const fileList = files.split(/\s+/).filter(Boolean);
      if (fileList.length === 0) {
        throw new ToolExecutionError('git_add', 'files must name at least one path.');
      }

      const { output, exitCode } = await runGit('git_add', ['add', '--', ...fileList], args, context);
      if (exitCode !== 0) {
        throw new ToolExecutionError('git_add', output);
      }
      return `Staged: ${fileList.join(' ')}`;
    },
  };
}

function buildGitCommitTool(): Tool {
  return {
    name: 'git_commit',
    description: 'Commit the staged changes with a message.',
    parameters: [{ name: 'message', type: 'string', description: 'Commit message' }, REPO_PATH_PARAMETER],
    async execute(args, context) {
      const message = requireString('git_commit', args, 'message');
      const { output, exitCode } = await runGit('git_commit', ['commit', '-m', message], args, context);
      if (exitCode !== 0) {
        if (output.toLowerCase().includes('nothing to commit')) {
          return 'Nothing to commit';
        }
        throw new ToolExecutionError('git_commit', output);
      }
      return output.split('\n')[0] || 'Committed';
    },
  };
}

function buildGitBranchTool(): Tool {
  return {
    name: 'git_branch',
    description: 'List branches, or create one when a name is given.',
    parameters: [
      { name: 'name', type: 'string', description: 'Branch to create (omit to list)', required: false },
      REPO_PATH_PARAMETER,
    ],
    async execute(args, context) {
      const name = optionalString(args, 'name');
      const { output, exitCode } = await runGit('git_branch', name ? ['branch', name] : ['branch', '-a'], args, context);
      if (exitCode !== 0) {
        throw new ToolExecutionError('git_branch', output);
      }
      return name ? `Created branch: ${name}` : output || 'No branches';
    },
  };
}

function buildGitCheckoutTool(): Tool {
  return {
    name: 'git_checkout',
    description: 'Switch to a branch or commit. create=true makes a new branch first.',
    parameters: [
      { name: 'target', type: 'string', description: 'Branch name or commit' },
      { name: 'create', type: 'boolean', description: 'Create the branch (-b)', required: false, default: false },
      REPO_PATH_PARAMETER,
    ],
    async execute(args, context) {
      const target = requireString('git_checkout', args, 'target');
      const create = optionalBoolean(args, 'create');
      const gitArgs = create ? ['checkout', '-b', target] : ['checkout', target];

      const { output, exitCode } = await runGit('git_checkout', gitArgs, args, context);
      if (exitCode !== 0) {
        throw new ToolExecutionError('git_checkout', output);
      }
      return `Switched to ${create ? 'new branch' : 'branch'}: ${target}`;
    },
  };
}

function buildGitInitTool(): Tool {
  return {
    name: 'git_init',
    description: 'Initialize a git repository.',
    parameters: [REPO_PATH_PARAMETER],
    async execute(args, context) {
      const repoPath = optionalString(args, 'path') ?? '.';
      const { output, exitCode } = await runGit('git_init', ['init'], args, context);
      if (exitCode !== 0) {
        throw new ToolExecutionError('git_init', output);
      }
      return output.toLowerCase().includes('reinitialized')
        ? `Reinitialized existing Git repository in ${repoPath}`
        : `Initialized empty Git repository in ${repoPath}`;
    },
  };
}

export function createGitTools(): Tool[] {
  return [
    buildGitStatusTool(),
    buildGitDiffTool(),
    buildGitLogTool(),
    buildGitAddTool(),
    buildGitCommitTool(),
    buildGitBranchTool(),
    buildGitCheckoutTool(),
    buildGitInitTool(),
  ];
}
