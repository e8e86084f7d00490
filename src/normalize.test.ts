import { describe, expect, it } from 'vitest';
import { normalizeCwd } from './normalize.js';

describe('normalizeCwd', () => {
  it('ignores separator style, case and trailing separators', () => {
    expect(normalizeCwd('C:\\Foo\\Bar')).toBe('c:/foo/bar');
    expect(normalizeCwd('c:/foo/bar/')).toBe('c:/foo/bar');
    expect(normalizeCwd('/Work/Proj///')).toBe('/work/proj');
  });

  it('strips verbatim prefixes', () => {
    expect(normalizeCwd('\\\\?\\C:\\Work\\Proj\\')).toBe('c:/work/proj');
    expect(normalizeCwd('//?/c:/work/proj')).toBe('c:/work/proj');
    expect(normalizeCwd('\\\\.\\C:\\Work')).toBe('c:/work');
  });

  it('maps a verbatim UNC path onto its plain form', () => {
    expect(normalizeCwd('\\\\?\\UNC\\Server\\Share\\dir')).toBe('//server/share/dir');
    expect(normalizeCwd('\\\\Server\\Share\\dir\\')).toBe('//server/share/dir');
  });

  it('turns a bare root into the empty string', () => {
    expect(normalizeCwd('/')).toBe('');
    expect(normalizeCwd('\\\\?\\')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'C:\\Foo\\Bar\\',
      '//?///?/x',
      '\\\\?\\unc\\?\\unc\\host\\share',
      '/home/user/Project',
      'relative\\path/',
      '',
      '/',
    ];
    for (const p of samples) {
      const once = normalizeCwd(p);
      expect(normalizeCwd(once)).toBe(once);
    }
  });
});
