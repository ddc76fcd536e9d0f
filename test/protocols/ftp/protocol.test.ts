import { describe, it, expect } from 'vitest';
import { FtpProtocol } from '../../../src/protocols/ftp/protocol.js';
import { MalformedAddressError } from '../../../src/core/errors.js';
import { createMockLogger } from '../../helpers/mock-logger.js';

describe('FtpProtocol', () => {
  it('should parse replies and log unparsable ones to its logger', () => {
    const logger = createMockLogger();
    const protocol = new FtpProtocol({ logger });

    expect(protocol.parseReply('220 Welcome')).toEqual({ code: 220, message: 'Welcome' });
    expect(protocol.parseReply('hello')).toEqual({ code: null, message: 'hello' });
    expect(logger.error).toHaveBeenCalledWith({ reply: 'hello' }, 'Unable to parse FTP reply');
  });

  it('should decode and encode data addresses', () => {
    const protocol = new FtpProtocol({ logger: createMockLogger() });

    expect(protocol.parsePassiveAddress('Entering Passive Mode (127,0,0,1,195,80)')).toEqual({
      host: '127.0.0.1',
      port: 50000,
    });
    expect(protocol.buildActiveCommandArgument('127.0.0.1', 50000)).toBe('127,0,0,1,195,80');
    expect(() => protocol.parsePassiveAddress('Entering Passive Mode')).toThrow(MalformedAddressError);
  });

  it('should route listing diagnostics to its logger', () => {
    const logger = createMockLogger();
    const protocol = new FtpProtocol({ logger });

    expect(protocol.parseStructuredListing(['type=file;size=3;'])).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      { line: 'type=file;size=3;', reason: 'missing name' },
      'Skipping unparsable MLSD line'
    );

    expect(protocol.parseTextListing(['total 8'])).toEqual([{ name: 'total 8', type: 'unknown' }]);
    expect(logger.debug).toHaveBeenCalledWith({ line: 'total 8' }, 'Not a Unix listing line');
  });

  it('should use the reference time for LIST dates', () => {
    const protocol = new FtpProtocol({ logger: createMockLogger() });
    const now = new Date(Date.UTC(2024, 0, 10));

    const [entry] = protocol.parseTextListing(['-rw-r--r-- 1 user group 10 Dec 31 23:59 notes.txt'], now);

    expect(entry.modified).toBe('Dec 31 23:59');
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2023, 11, 31, 23, 59)));
  });

  it('should classify files with the default extensions', () => {
    const protocol = new FtpProtocol();

    expect(protocol.isBinaryFile('photo.JPG')).toBe(true);
    expect(protocol.isBinaryFile('README.md')).toBe(false);
    expect(protocol.transferModeFor('archive.tar.gz')).toBe('I');
    expect(protocol.transferModeFor('config.yaml')).toBe('A');
  });

  it('should honour custom text extensions', () => {
    const protocol = new FtpProtocol({ textExtensions: ['.sql'] });

    expect(protocol.transferModeFor('dump.sql')).toBe('A');
    expect(protocol.transferModeFor('notes.txt')).toBe('I');
  });

  it('should let a classifier replace the extension check', () => {
    const protocol = new FtpProtocol({ classifier: (filename) => filename.startsWith('bin/') });

    expect(protocol.transferModeFor('bin/tool')).toBe('I');
    expect(protocol.transferModeFor('photo.jpg')).toBe('A');
  });
});
