/**
 * Runs external programs (editor, agent) in the foreground and manages the
 * temporary files behind editor sessions.
 *
 * The terminal hand-off itself belongs to the driver; this module only
 * decides what to run and what to do with the file afterwards.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomBytes } from 'crypto';
import {
  AGENT_ENV,
  DEFAULT_AGENT,
  DEFAULT_EDITOR,
  EDITOR_ENV,
  TEMP_FILE_PREFIX,
  TEMP_FILE_SUFFIX,
} from './constants.js';
import { sanitizeEditorContent } from './editor-content.js';
import { EditorSessionError, errorMessage, toError } from './errors.js';
import type { EditorSession } from './modes.js';
import type { EditorKind } from './options.js';

export type ExternalCompletion = { ok: true } | { ok: false; error: Error };

/** Something that can run a program with the terminal handed over to it. */
export interface ExternalRunner {
  exec(command: string, args: string[]): Promise<ExternalCompletion>;
}

export interface ExternalCommand {
  command: string;
  args: string[];
}

export type EditorCollection =
  | { kind: 'content'; text: string }
  | { kind: 'cancelled' }
  | { kind: 'error'; error: Error };

export type SessionFs = Pick<typeof fs, 'openSync' | 'writeFileSync' | 'closeSync' | 'readFileSync' | 'rmSync'>;

export interface SubprocessOrchestratorOptions {
  runner: ExternalRunner;
  env?: NodeJS.ProcessEnv;
  /** Configured editor, used when the environment names none. */
  editor?: string;
  /** Configured agent command, used when the environment names none. */
  agent?: string;
  tmpDir?: string;
  fs?: SessionFs;
  log?: (line: string) => void;
}

function splitCommand(value: string, fallback: string): ExternalCommand {
  const parts = value.trim().split(/\s+/).filter(part => part.length > 0);
  if (parts.length === 0) return { command: fallback, args: [] };
  const [command, ...args] = parts;
  return { command, args };
}

export function resolveEditorCommand(env: NodeJS.ProcessEnv, configured?: string): ExternalCommand {
  return splitCommand(env[EDITOR_ENV] || configured || DEFAULT_EDITOR, DEFAULT_EDITOR);
}

export function resolveAgentCommand(env: NodeJS.ProcessEnv, configured?: string): ExternalCommand {
  return splitCommand(env[AGENT_ENV] || configured || DEFAULT_AGENT, DEFAULT_AGENT);
}

export function tempFileName(pid: number, now: number, suffix: string): string {
  return `${TEMP_FILE_PREFIX}${pid}-${now}-${suffix}${TEMP_FILE_SUFFIX}`;
}

export class SubprocessOrchestrator {
  private readonly runner: ExternalRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly fs: SessionFs;
  private readonly tmpDir: string;
  private readonly log: (line: string) => void;
  private readonly editor?: string;
  private readonly agent?: string;

  constructor(options: SubprocessOrchestratorOptions) {
    this.runner = options.runner;
    this.env = options.env ?? process.env;
    this.fs = options.fs ?? fs;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.log = options.log ?? (() => {});
    this.editor = options.editor;
    this.agent = options.agent;
  }

  /** Never rejects; failures come back as `{ ok: false }`. */
  async runExternal(command: string, args: string[]): Promise<ExternalCompletion> {
    this.log(`exec ${command} ${args.join(' ')}`);
    try {
      const completion = await this.runner.exec(command, args);
      if (!completion.ok) this.log(`exec ${command} failed: ${completion.error.message}`);
      return completion;
    } catch (err) {
      this.log(`exec ${command} failed: ${errorMessage(err)}`);
      return { ok: false, error: toError(err) };
    }
  }

  /**
   * Create the session file exclusively and write the initial content.
   * Throws {@link EditorSessionError} when the file cannot be created; a
   * failed write removes the file and throws a plain Error.
   */
  openEditorSession<T>(item: T, kind: EditorKind, content: string): EditorSession<T> {
    const file = path.join(this.tmpDir, tempFileName(process.pid, Date.now(), randomBytes(4).toString('hex')));
    let fd: number;
    try {
      fd = this.fs.openSync(file, 'wx', 0o600);
    } catch (err) {
      throw new EditorSessionError(`Failed to create temp file: ${errorMessage(err)}`, { cause: err });
    }
    try {
      this.fs.writeFileSync(fd, content, 'utf8');
    } catch (err) {
      this.fs.closeSync(fd);
      this.removeFile(file);
      throw new Error(`Failed to write temp file: ${errorMessage(err)}`, { cause: err });
    }
    this.fs.closeSync(fd);
    this.log(`editor session ${kind} at ${file}`);
    return { item, kind, path: file };
  }

  runEditorSession<T>(session: EditorSession<T>): Promise<ExternalCompletion> {
    const editor = resolveEditorCommand(this.env, this.editor);
    return this.runExternal(editor.command, [...editor.args, session.path]);
  }

  /** Read, sanitize and delete the session file. */
  collectEditorSession<T>(session: EditorSession<T>): EditorCollection {
    let raw: string;
    try {
      raw = this.fs.readFileSync(session.path, 'utf8');
    } catch (err) {
      return { kind: 'error', error: new Error(`Failed to read temp file: ${errorMessage(err)}`, { cause: err }) };
    } finally {
      this.discardEditorSession(session);
    }
    const text = sanitizeEditorContent(raw);
    return text === '' ? { kind: 'cancelled' } : { kind: 'content', text };
  }

  /** Removal failures are logged; a leftover temp file never ends the run. */
  discardEditorSession<T>(session: EditorSession<T>): void {
    this.removeFile(session.path);
  }

  private removeFile(file: string): void {
    try {
      this.fs.rmSync(file, { force: true });
    } catch (err) {
      this.log(`failed to remove ${file}: ${errorMessage(err)}`);
    }
  }

  editFile(file: string, line: number): Promise<ExternalCompletion> {
    const editor = resolveEditorCommand(this.env, this.editor);
    const args = line > 0 ? [...editor.args, `+${line}`, file] : [...editor.args, file];
    return this.runExternal(editor.command, args);
  }

  launchAgent(prompt: string): Promise<ExternalCompletion> {
    const agent = resolveAgentCommand(this.env, this.agent);
    return this.runExternal(agent.command, [...agent.args, prompt]);
  }
}
