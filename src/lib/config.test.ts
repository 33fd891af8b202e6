import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { entryTarget, findEntry, getDefaultConfig, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('config', () => {
  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig('~/dotfiles');

      expect(config.dotfilesDir).toBe('~/dotfiles');
      expect(config.vars).toEqual([]);
      expect(config.secrets).toEqual([]);
      expect(config.atomicDeploy).toBe(true);
      expect(config.files).toEqual([]);
      expect(config.filesets).toEqual([]);
    });
  });

  describe('entryTarget', () => {
    it('should default to ~/.config/{src}', () => {
      expect(entryTarget({ src: 'kitty/kitty.conf' })).toBe('~/.config/kitty/kitty.conf');
    });

    it('should prefer an explicit target', () => {
      expect(entryTarget({ src: 'zshrc', target: '~/.zshrc' })).toBe('~/.zshrc');
    });
  });

  describe('parseConfig', () => {
    it('should normalize file entries with defaults', () => {
      const config = parseConfig(
        [
          'dotfiles_dir = "~/dotfiles"',
          'vars = ["vars.toml"]',
          '',
          '[[files]]',
          'src = "kitty/kitty.conf"',
          '',
          '[[files]]',
          'src = "zshrc"',
          'target = "~/.zshrc"',
          'template = false',
          'vars = ["zsh.toml"]',
          '',
        ].join('\n'),
        '/tmp/config.toml'
      );

      expect(config.dotfilesDir).toBe('~/dotfiles');
      expect(config.vars).toEqual(['vars.toml']);
      expect(config.files).toEqual([
        { src: 'kitty/kitty.conf', target: undefined, template: true, vars: [], secrets: [] },
        { src: 'zshrc', target: '~/.zshrc', template: false, vars: ['zsh.toml'], secrets: [] },
      ]);
    });

    it('should keep filesets in declaration order', () => {
      const config = parseConfig(
        [
          'dotfiles_dir = "~/dotfiles"',
          '[filesets.term]',
          'patterns = ["kitty/*"]',
          '[filesets.shell]',
          'patterns = ["zsh*", "bash*"]',
          'vars = ["shell.toml"]',
        ].join('\n'),
        '/tmp/config.toml'
      );

      expect(config.filesets.map((f) => f.name)).toEqual(['term', 'shell']);
      expect(config.filesets[1]).toEqual({
        name: 'shell',
        patterns: ['zsh*', 'bash*'],
        vars: ['shell.toml'],
        secrets: [],
      });
    });

    it('should read atomic_deploy', () => {
      const config = parseConfig('dotfiles_dir = "d"\natomic_deploy = false\n', '/tmp/c.toml');
      expect(config.atomicDeploy).toBe(false);
    });

    it('should throw ConfigError on malformed TOML', () => {
      expect(() => parseConfig('dotfiles_dir = ', '/tmp/c.toml')).toThrow(
        'Failed to parse config file: /tmp/c.toml'
      );
    });

    it('should list every validation issue', () => {
      let caught: unknown;
      try {
        parseConfig('[[files]]\ntarget = "~/.x"\n', '/tmp/c.toml');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.message).toBe('Invalid config file: /tmp/c.toml');
        expect(caught.issues).toEqual([
          'dotfiles_dir: dotfiles_dir is required',
          'files[0].src: src is required and must be a string',
        ]);
      }
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dotloop-config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load config and derive the layout', () => {
      const configPath = path.join(tempDir, 'config.toml');
      const root = path.join(tempDir, 'dots');
      fs.writeFileSync(configPath, `dotfiles_dir = "${root}"\n`);

      const loaded = loadConfig(configPath);

      expect(loaded.configPath).toBe(configPath);
      expect(loaded.config.dotfilesDir).toBe(root);
      expect(loaded.layout.root).toBe(root);
      expect(loaded.layout.generatedDir).toBe(path.join(root, '.generated'));
      expect(loaded.layout.stagedDir).toBe(path.join(root, '.staged'));
      expect(loaded.layout.statePath).toBe(path.join(root, '.dotloop_state.toml'));
    });

    it('should throw when the config file is missing', () => {
      const configPath = path.join(tempDir, 'missing.toml');
      expect(() => loadConfig(configPath)).toThrow(`Config file not found: ${configPath}`);
    });
  });

  describe('findEntry', () => {
    it('should find an entry by src', () => {
      const config = getDefaultConfig('d');
      config.files.push({ src: 'a', template: true, vars: [], secrets: [] });

      expect(findEntry(config, 'a')?.src).toBe('a');
      expect(findEntry(config, 'b')).toBeUndefined();
    });
  });
});
