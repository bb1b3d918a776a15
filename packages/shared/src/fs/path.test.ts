import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { expandHome, cacheHome } from './path';

describe('path', () => {
  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~/.cabal/packages', '/home/test')).toBe(
        path.join('/home/test', '.cabal/packages'),
      );
      expect(expandHome('~', '/home/test')).toBe('/home/test');
    });

    it('should leave other paths alone', () => {
      expect(expandHome('/srv/index.tar', '/home/test')).toBe('/srv/index.tar');
      expect(expandHome('a~/b', '/home/test')).toBe('a~/b');
    });
  });

  describe('cacheHome', () => {
    it('should prefer an absolute XDG_CACHE_HOME', () => {
      expect(
        cacheHome({ env: { XDG_CACHE_HOME: '/xdg/cache' }, homeDir: '/home/test', platform: 'linux' }),
      ).toBe('/xdg/cache');
    });

    it('should ignore a relative XDG_CACHE_HOME', () => {
      expect(
        cacheHome({ env: { XDG_CACHE_HOME: 'cache' }, homeDir: '/home/test', platform: 'linux' }),
      ).toBe(path.join('/home/test', '.cache'));
    });

    it('should fall back to ~/.cache', () => {
      expect(cacheHome({ env: {}, homeDir: '/home/test', platform: 'darwin' })).toBe(
        path.join('/home/test', '.cache'),
      );
    });

    it('should use LOCALAPPDATA on Windows', () => {
      expect(
        cacheHome({ env: { LOCALAPPDATA: 'C:\\Users\\test\\AppData\\Local' }, platform: 'win32' }),
      ).toBe('C:\\Users\\test\\AppData\\Local');
    });
  });
});
