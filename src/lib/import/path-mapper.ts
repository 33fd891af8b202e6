/**
 * Import Path Mapper
 *
 * Maps a path found outside the dotfiles root to its canonical `src`:
 *
 *   ~/.config/kitty/kitty.conf       -> kitty/kitty.conf
 *   $XDG_CONFIG_HOME/kitty/kitty.conf -> kitty/kitty.conf
 *   ~/.zshrc                         -> zshrc
 *   /etc/systemd/system/foo.service  -> etc_systemd_system/foo.service
 */

import path from 'path';
import { entryTarget, type FileEntry } from '../config.js';
import { collapseTilde, configHome, homeDir, isWithin } from '../paths.js';

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

export function mapImportPath(p: string): string {
  const absolute = path.resolve(p);
  const home = homeDir();

  for (const configDir of [configHome(), path.join(home, '.config')]) {
    if (absolute !== configDir && isWithin(configDir, absolute)) {
      return toPosix(path.relative(configDir, absolute));
    }
  }

  if (absolute !== home && isWithin(home, absolute)) {
    const rel = toPosix(path.relative(home, absolute));
    return rel.startsWith('.') ? rel.slice(1) : rel;
  }

  const parent = path
    .dirname(absolute)
    .split(path.sep)
    .filter((part) => part.length > 0)
    .join('_');
  const name = path.basename(absolute);
  return parent ? `${parent}/${name}` : name;
}

/**
 * Config entry for an imported path. The target is kept only when it
 * differs from the default for the mapped src.
 */
export function importEntry(p: string): FileEntry {
  const src = mapImportPath(p);
  const target = collapseTilde(path.resolve(p));
  return {
    src,
    target: target === entryTarget({ src }) ? undefined : target,
    template: true,
    vars: [],
    secrets: [],
  };
}
