import fs from 'fs';
import os from 'os';
import path from 'path';
import * as TOML from 'smol-toml';
import { vi, type MockInstance } from 'vitest';
import { loadConfig, type FileEntry, type LoadedConfig } from '../lib/config.js';
import { filePaths, type FilePaths } from '../lib/paths.js';
import { createPipelineContext, type PipelineContext } from '../lib/pipeline/index.js';
import type { ImportChoice, Prompter } from '../lib/prompts.js';
import type { SecretEngine } from '../lib/secrets/index.js';
import type { HunkDecider, HunkDecision, HunkRequest } from '../lib/sync/types.js';

/**
 * Secret engine answering from a fixed table
 */
export class FakeSecretEngine implements SecretEngine {
  calls: string[] = [];
  values: Record<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = values;
  }

  async resolve(engine: string, reference: string): Promise<string> {
    this.calls.push(`${engine}:${reference}`);
    const value = this.values[reference];
    if (value === undefined) {
      throw new Error(`no item at ${reference}`);
    }
    return value;
  }
}

/**
 * Prompter replaying queued answers, falling back to the non-interactive ones
 */
export class ScriptedPrompter implements Prompter {
  overwriteAnswers: boolean[] = [];
  importAnswers: ImportChoice[] = [];
  asked: string[] = [];

  async confirmOverwrite(src: string): Promise<boolean> {
    this.asked.push(`overwrite ${src}`);
    return this.overwriteAnswers.shift() ?? false;
  }

  async chooseImport(displayPath: string): Promise<ImportChoice> {
    this.asked.push(`import ${displayPath}`);
    return this.importAnswers.shift() ?? 'skip';
  }
}

/**
 * Hunk decider replaying queued decisions and recording what it was asked
 */
export class ScriptedDecider implements HunkDecider {
  requests: HunkRequest[] = [];

  constructor(private decisions: HunkDecision[] = []) {}

  async decide(request: HunkRequest): Promise<HunkDecision> {
    this.requests.push(request);
    return this.decisions.shift() ?? { kind: 'skip' };
  }
}

export interface FixtureFile {
  src: string;
  target?: string;
  template?: boolean;
  vars?: string[];
  secrets?: string[];
}

export interface FixtureConfig {
  vars?: string[];
  secrets?: string[];
  atomicDeploy?: boolean;
  files?: FixtureFile[];
  filesets?: Record<string, { patterns: string[]; vars?: string[]; secrets?: string[] }>;
}

/**
 * A dotfiles root, config file and fake home inside one temp directory.
 * os.homedir() answers with the fake home and XDG_CONFIG_HOME is unset
 * until cleanup().
 */
export class DotfilesFixture {
  readonly tempDir: string;
  readonly root: string;
  readonly home: string;
  readonly configPath: string;
  readonly engine = new FakeSecretEngine();
  readonly prompter = new ScriptedPrompter();
  loaded: LoadedConfig;

  private savedXdg: string | undefined;
  private homedirSpy: MockInstance<[], string>;
  private configDoc: FixtureConfig;

  constructor(config: FixtureConfig = {}) {
    this.tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'dotloop-test-')));
    this.root = path.join(this.tempDir, 'dotfiles');
    this.home = path.join(this.tempDir, 'home');
    this.configPath = path.join(this.home, '.config', 'dotloop', 'config.toml');
    fs.mkdirSync(this.root, { recursive: true });
    fs.mkdirSync(this.home, { recursive: true });

    this.homedirSpy = vi.spyOn(os, 'homedir').mockReturnValue(this.home);
    this.savedXdg = process.env.XDG_CONFIG_HOME;
    delete process.env.XDG_CONFIG_HOME;

    this.configDoc = config;
    this.loaded = this.writeConfig();
  }

  /**
   * Rewrite config.toml from the fixture description and reload it
   */
  writeConfig(config: FixtureConfig = this.configDoc): LoadedConfig {
    this.configDoc = config;
    const doc: Record<string, unknown> = { dotfiles_dir: this.root };
    if (config.vars) doc.vars = config.vars;
    if (config.secrets) doc.secrets = config.secrets;
    if (config.atomicDeploy !== undefined) doc.atomic_deploy = config.atomicDeploy;
    if (config.files && config.files.length > 0) {
      doc.files = config.files.map((f) => {
        const table: Record<string, unknown> = { src: f.src };
        if (f.target !== undefined) table.target = f.target;
        if (f.template !== undefined) table.template = f.template;
        if (f.vars) table.vars = f.vars;
        if (f.secrets) table.secrets = f.secrets;
        return table;
      });
    }
    if (config.filesets) doc.filesets = config.filesets;

    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, TOML.stringify(doc));
    this.loaded = loadConfig(this.configPath);
    return this.loaded;
  }

  /**
   * Add a [[files]] entry and write its source
   */
  addFile(file: FixtureFile, content: string, mode?: number): FileEntry {
    this.writeConfig({ ...this.configDoc, files: [...(this.configDoc.files ?? []), file] });
    this.writeSource(file.src, content, mode);
    const entry = this.loaded.config.files.find((f) => f.src === file.src);
    if (!entry) {
      throw new Error(`fixture entry ${file.src} was not loaded`);
    }
    return entry;
  }

  writeSource(src: string, content: string, mode?: number): void {
    this.write(path.join(this.root, src), content, mode);
  }

  write(p: string, content: string, mode?: number): void {
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, content);
    if (mode !== undefined) {
      fs.chmodSync(p, mode);
    }
  }

  read(p: string): string {
    return fs.readFileSync(p, 'utf8');
  }

  paths(src: string): FilePaths {
    return filePaths(this.loaded.layout, src);
  }

  /** Default target of a src under the fake home */
  defaultTarget(src: string): string {
    return path.join(this.home, '.config', src);
  }

  entries(): FileEntry[] {
    return [...this.loaded.config.files];
  }

  context(options: { dryRun?: boolean; failFast?: boolean } = {}): PipelineContext {
    return createPipelineContext(this.loaded, {
      ...options,
      engine: this.engine,
      prompter: this.prompter,
    });
  }

  cleanup(): void {
    this.homedirSpy.mockRestore();
    if (this.savedXdg !== undefined) {
      process.env.XDG_CONFIG_HOME = this.savedXdg;
    }
    fs.rmSync(this.tempDir, { recursive: true, force: true });
  }
}

/**
 * Every regular file and symlink under dir with its content, for
 * before/after comparisons
 */
export function snapshotTree(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      const rel = path.relative(dir, full);
      if (entry.isSymbolicLink()) {
        out[rel] = `-> ${fs.readlinkSync(full)}`;
      } else if (entry.isDirectory()) {
        out[`${rel}/`] = '';
        walk(full);
      } else {
        const mode = (fs.statSync(full).mode & 0o7777).toString(8);
        out[rel] = `${mode} ${fs.readFileSync(full, 'utf8')}`;
      }
    }
  };
  walk(dir);
  return out;
}
