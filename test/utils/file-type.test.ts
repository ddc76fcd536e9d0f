import { describe, it, expect } from 'vitest';
import { isBinaryFile } from '../../src/utils/file-type.js';

describe('isBinaryFile', () => {
  it('should treat known text extensions as text', () => {
    expect(isBinaryFile('README.md')).toBe(false);
    expect(isBinaryFile('config.yml')).toBe(false);
    expect(isBinaryFile('/var/log/app.log')).toBe(false);
  });

  it('should ignore case', () => {
    expect(isBinaryFile('INDEX.HTML')).toBe(false);
  });

  it('should treat other extensions as binary', () => {
    expect(isBinaryFile('photo.jpg')).toBe(true);
    expect(isBinaryFile('backup.tar.gz')).toBe(true);
  });

  it('should treat names without an extension as binary', () => {
    expect(isBinaryFile('Makefile')).toBe(true);
    expect(isBinaryFile('.bashrc')).toBe(true);
  });

  it('should use a custom extension list', () => {
    expect(isBinaryFile('query.sql', ['.sql'])).toBe(false);
    expect(isBinaryFile('notes.txt', ['.sql'])).toBe(true);
  });
});
