// runtime/core/builtins/devtools.ts

import { execFile } from 'node:child_process';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'node:path';
import fg from 'fast-glob';
import type { ToolResource, ValueObject } from '../../../core/types.ts';
import { DEFAULTS, DEVTOOLS_BUNDLE } from '../../../core/constants.ts';
import { createLogger } from '../../shared/logger.ts';
import { CallFailureError, CancelledError, EvalError } from '../errors.ts';
import type { BuiltinTool } from '../toolsRuntime.ts';
import { optionalBoolean, optionalNumber, optionalString, requireString } from './args.ts';

const log = createLogger('devtools');

const MAX_LINE_LENGTH = 2000;
const MAX_SHELL_OUTPUT = 30_000;
const MAX_SHELL_TIMEOUT_MS = 600_000;

function resolvePath(workdir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(workdir, path);
}

function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function numbered(lineNumber: number, line: string): string {
  return `${String(lineNumber).padStart(6)}\t${line}`;
}

// -----------------------------
// Files
// -----------------------------

export const readFileTool: BuiltinTool = {
  name: 'read_file',
  required: ['file_path'],
  schema: {
    name: 'read_file',
    description: 'Read a file and return its lines prefixed with line numbers.',
    parameters: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Absolute or relative path of the file to read' },
        offset: { type: 'integer', description: 'Line number to start reading from (1-based). Default: 1' },
        limit: { type: 'integer', description: 'Maximum number of lines to return. Default: 2000' },
      },
      required: ['file_path'],
    },
  },
  async execute({ tool, args, services }) {
    const path = requireString(args, tool, 'file_path');
    const offset = Math.max(1, Math.trunc(optionalNumber(args, 'offset') ?? 1));
    const limit = Math.max(0, Math.trunc(optionalNumber(args, 'limit') ?? 2000));

    const content = await readFile(resolvePath(services.workdir, path), 'utf-8');
    const lines = splitLines(content);
    const selected = lines
      .slice(offset - 1, offset - 1 + limit)
      .map((line, i) => numbered(offset + i, line.slice(0, MAX_LINE_LENGTH)));

    log.debug('read_file', { path, totalLines: lines.length, returned: selected.length });
    return {
      content: selected.join('\n'),
      total_lines: lines.length,
      lines_returned: selected.length,
      offset,
    };
  },
};

export const writeFileTool: BuiltinTool = {
  name: 'write_file',
  required: ['file_path', 'content'],
  schema: {
    name: 'write_file',
    description: 'Write content to a file. Creates parent directories if needed. Overwrites an existing file.',
    parameters: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Absolute or relative path of the file to write' },
        content: { type: 'string', description: 'The content to write to the file' },
      },
      required: ['file_path', 'content'],
    },
  },
  async execute({ tool, args, services }) {
    const path = requireString(args, tool, 'file_path');
    const content = requireString(args, tool, 'content');
    const target = resolvePath(services.workdir, path);

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');

    return {
      status: 'ok',
      file_path: path,
      lines_written: splitLines(content).length,
      bytes_written: Buffer.byteLength(content, 'utf-8'),
    };
  },
};

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export const editFileTool: BuiltinTool = {
  name: 'edit_file',
  required: ['file_path', 'old_string', 'new_string'],
  schema: {
    name: 'edit_file',
    description:
      'Replace an exact string in a file. old_string must be unique unless replace_all is true.',
    parameters: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Absolute or relative path of the file to edit' },
        old_string: { type: 'string', description: 'The exact text to replace. Must be unique in the file.' },
        new_string: { type: 'string', description: 'The replacement text' },
        replace_all: { type: 'boolean', description: 'Replace every occurrence. Default: false' },
      },
      required: ['file_path', 'old_string', 'new_string'],
    },
  },
  async execute({ tool, args, services }) {
    const path = requireString(args, tool, 'file_path');
    const oldString = requireString(args, tool, 'old_string');
    const newString = requireString(args, tool, 'new_string');
    const replaceAll = optionalBoolean(args, 'replace_all') ?? false;
    const target = resolvePath(services.workdir, path);

    if (oldString.length === 0) {
      throw new CallFailureError('edit_file: old_string must not be empty', { file_path: path });
    }

    const content = await readFile(target, 'utf-8');
    const matches = countOccurrences(content, oldString);
    if (matches === 0) {
      throw new CallFailureError(`edit_file: old_string not found in ${path}`, { file_path: path });
    }
    if (matches > 1 && !replaceAll) {
      throw new CallFailureError(
        `edit_file: old_string found ${matches} times in ${path}; use replace_all or a unique string`,
        { file_path: path, matches },
      );
    }

    const updated = replaceAll ? content.split(oldString).join(newString) : content.replace(oldString, () => newString);
    await writeFile(target, updated, 'utf-8');

    return { status: 'ok', file_path: path, replacements: replaceAll ? matches : 1 };
  },
};

// -----------------------------
// Search
// -----------------------------

export const globTool: BuiltinTool = {
  name: 'glob',
  required: ['pattern'],
  schema: {
    name: 'glob',
    description: 'Find files matching a glob pattern such as "src/**/*.ts".',
    parameters: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Glob pattern to match' },
        path: { type: 'string', description: 'Base directory to search in. Defaults to the working directory.' },
      },
      required: ['pattern'],
    },
  },
  async execute({ tool, args, services }) {
    const pattern = requireString(args, tool, 'pattern');
    const base = resolvePath(services.workdir, optionalString(args, 'path') ?? '.');

    const matches = (await fg(pattern, { cwd: base, dot: false })).sort();
    return { matches, count: matches.length, pattern };
  },
};

async function collectFiles(target: string, include: string | undefined): Promise<string[]> {
  const info = await stat(target);
  if (info.isFile()) return [target];
  const files = await fg(include ?? '**/*', { cwd: target, absolute: true, onlyFiles: true });
  return files.sort();
}

export const grepTool: BuiltinTool = {
  name: 'grep',
  required: ['pattern'],
  schema: {
    name: 'grep',
    description: 'Search file contents with a regular expression and return matching lines.',
    parameters: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Regular expression to search for' },
        path: { type: 'string', description: 'File or directory to search in. Defaults to the working directory.' },
        include: { type: 'string', description: 'Glob filter for files, e.g. "*.ts" or "**/*.{ts,tsx}"' },
        context_lines: { type: 'integer', description: 'Lines of context before and after each match. Default: 0' },
        max_matches: { type: 'integer', description: 'Maximum number of matches to return. Default: 50' },
      },
      required: ['pattern'],
    },
  },
  async execute({ tool, args, services }) {
    const source = requireString(args, tool, 'pattern');
    const target = resolvePath(services.workdir, optionalString(args, 'path') ?? '.');
    const include = optionalString(args, 'include');
    const contextLines = Math.max(0, Math.trunc(optionalNumber(args, 'context_lines') ?? 0));
    const maxMatches = Math.max(1, Math.trunc(optionalNumber(args, 'max_matches') ?? 50));

    let regex: RegExp;
    try {
      regex = new RegExp(source);
    } catch (err) {
      throw new EvalError(`Invalid regex pattern: ${source}`, { reason: err instanceof Error ? err.message : String(err) });
    }

    const files = await collectFiles(target, include);
    const matches: ValueObject[] = [];
    let totalMatches = 0;

    for (const file of files) {
      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (err) {
        log.debug('grep skipped unreadable file', { file, error: err instanceof Error ? err.message : String(err) });
        continue;
      }

      const lines = splitLines(content);
      lines.forEach((line, index) => {
        if (!regex.test(line)) return;
        totalMatches++;
        if (matches.length >= maxMatches) return;

        const start = Math.max(0, index - contextLines);
        const end = Math.min(lines.length, index + contextLines + 1);
        const context: string[] = [];
        for (let i = start; i < end; i++) context.push(numbered(i + 1, lines[i]));

        matches.push({
          file: relative(services.workdir, file),
          line: index + 1,
          match: line.trim(),
          context: context.join('\n'),
        });
      });
    }

    return {
      matches,
      total_matches: totalMatches,
      files_searched: files.length,
      truncated: totalMatches > maxMatches,
    };
  },
};

// -----------------------------
// Shell
// -----------------------------

interface ShellOutcome {
  stdout: string;
  stderr: string;
  exitCode: number;
}

function runShell(command: string, cwd: string, timeoutMs: number, signal: AbortSignal): Promise<ShellOutcome> {
  return new Promise((resolvePromise, reject) => {
    execFile(
      'sh',
      ['-c', command],
      { cwd, timeout: timeoutMs, signal, maxBuffer: 16 * 1024 * 1024, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolvePromise({ stdout, stderr, exitCode: 0 });
          return;
        }
        if (signal.aborted) {
          reject(new CancelledError());
          return;
        }
        if (typeof error.code === 'number') {
          resolvePromise({ stdout, stderr, exitCode: error.code });
          return;
        }
        if (error.killed) {
          reject(new CallFailureError(`Command timed out after ${timeoutMs} ms: ${command}`, { timeoutMs }));
          return;
        }
        reject(new CallFailureError(`Failed to execute command: ${error.message}`));
      },
    );
  });
}

function truncate(text: string): string {
  return text.length > MAX_SHELL_OUTPUT ? `${text.slice(0, MAX_SHELL_OUTPUT)}\n... (output truncated)` : text;
}

export const bashTool: BuiltinTool = {
  name: 'bash',
  schema: {
    name: 'bash',
    description: 'Execute a shell command. Returns stdout, stderr and the exit code.',
    parameters: {
      type: 'object',
      properties: {
        command: { type: 'string', description: 'The command to execute' },
        timeout: { type: 'integer', description: 'Timeout in milliseconds. Default: 30000, max: 600000' },
        description: { type: 'string', description: 'Brief description of what the command does' },
      },
      required: ['command'],
    },
  },
  async execute({ tool, args, signal, services, node }) {
    const command = optionalString(args, 'command') ?? requireString(args, tool, 'cmd');
    const timeoutMs = Math.min(
      MAX_SHELL_TIMEOUT_MS,
      Math.max(1, Math.trunc(optionalNumber(args, 'timeout') ?? DEFAULTS.shellTimeoutMs)),
    );
    log.info('bash', { node, command, description: optionalString(args, 'description') ?? null });

    const outcome = await runShell(command, services.workdir, timeoutMs, signal);
    return {
      stdout: truncate(outcome.stdout).trim(),
      stderr: truncate(outcome.stderr).trim(),
      exit_code: outcome.exitCode,
      ok: outcome.exitCode === 0,
    };
  },
};

export const DEVTOOLS: readonly BuiltinTool[] = [readFileTool, writeFileTool, editFileTool, globTool, grepTool, bashTool];

/**
 * Schemas of the file and shell builtins, offered to agents as one bundle.
 */
export function devtoolsBundle(): ToolResource {
  const tools = DEVTOOLS.flatMap((tool) => (tool.schema ? [{ type: 'function' as const, function: tool.schema }] : []));
  return {
    slug: DEVTOOLS_BUNDLE,
    name: 'Developer tools',
    description: 'Read, write, edit and search files; run shell commands.',
    tools,
  };
}
