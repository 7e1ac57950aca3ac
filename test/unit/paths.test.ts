import { describe, it, expect } from 'vitest';
import { joinPath, rebaseBind, removeRedundantSlashes } from '../../src/paths.js';

describe('removeRedundantSlashes', () => {
  it('collapses doubled separators and current-directory segments', () => {
    expect(removeRedundantSlashes('a//b/./c')).toBe('a/b/c');
    expect(removeRedundantSlashes('a/././b')).toBe('a/b');
  });

  it('keeps a leading ./', () => {
    expect(removeRedundantSlashes('./ctx/app.def')).toBe('./ctx/app.def');
  });
});

describe('joinPath', () => {
  it('prefixes relative paths', () => {
    expect(joinPath('common', './data')).toBe('common/data');
    expect(joinPath('/opt/', 'app.tar.gz')).toBe('/opt/app.tar.gz');
  });

  it('passes absolute paths and the current directory through', () => {
    expect(joinPath('common', '/srv/data')).toBe('/srv/data');
    expect(joinPath('.', 'app.def')).toBe('app.def');
    expect(joinPath('common', '.')).toBe('common');
  });
});

describe('rebaseBind', () => {
  it('rewrites only the host side', () => {
    expect(rebaseBind('base', './data:/data')).toBe('base/data:/data');
    expect(rebaseBind('base', './:/mount')).toBe('base:/mount');
    expect(rebaseBind('base', '/abs:/mount')).toBe('/abs:/mount');
  });
});
