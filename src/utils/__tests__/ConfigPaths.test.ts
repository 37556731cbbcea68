import { describe, it, expect } from 'vitest';
import path from 'path';
import { resolveConfigBase } from '../ConfigPaths.js';

describe('resolveConfigBase', () => {
  const home = path.join('/home', 'user');

  it('uses ~/.config on Linux', () => {
    expect(resolveConfigBase('linux', {}, home)).toBe(path.join(home, '.config'));
  });

  it('respects XDG_CONFIG_HOME', () => {
    expect(resolveConfigBase('linux', { XDG_CONFIG_HOME: '/xdg' }, home)).toBe('/xdg');
  });

  it('uses Application Support on macOS', () => {
    expect(resolveConfigBase('darwin', { XDG_CONFIG_HOME: '/xdg' }, home))
      .toBe(path.join(home, 'Library', 'Application Support'));
  });

  it('uses APPDATA on Windows, falling back to the roaming profile', () => {
    expect(resolveConfigBase('win32', { APPDATA: 'C:\\Users\\user\\AppData\\Roaming' }, home))
      .toBe('C:\\Users\\user\\AppData\\Roaming');
    expect(resolveConfigBase('win32', {}, home)).toBe(path.join(home, 'AppData', 'Roaming'));
  });
});
