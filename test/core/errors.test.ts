import { describe, it, expect } from 'vitest';
import {
  FtpError,
  ParseError,
  MalformedAddressError,
  InvalidResponseError,
  FtpCommandError,
  ValidationError,
  ConfigurationError,
} from '../../src/core/errors.js';

describe('Error Classes', () => {
  describe('FtpError', () => {
    it('should default to no code, no suggestions and not retriable', () => {
      const error = new FtpError('Something broke');
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('FtpError');
      expect(error.code).toBeUndefined();
      expect(error.suggestions).toEqual([]);
      expect(error.retriable).toBe(false);
    });
  });

  describe('ParseError', () => {
    it('should keep format and input', () => {
      const error = new ParseError('Bad listing', { format: 'mlsd', input: 'garbage' });
      expect(error.name).toBe('ParseError');
      expect(error.format).toBe('mlsd');
      expect(error.input).toBe('garbage');
      expect(error.suggestions).toContain('Verify the input is in the expected format.');
    });
  });

  describe('MalformedAddressError', () => {
    it('should describe the offending reply', () => {
      const error = new MalformedAddressError('Entering Passive Mode');
      expect(error).toBeInstanceOf(ParseError);
      expect(error.name).toBe('MalformedAddressError');
      expect(error.message).toBe('Malformed address in "Entering Passive Mode": expected six comma-separated numbers');
      expect(error.format).toBe('pasv');
      expect(error.input).toBe('Entering Passive Mode');
      expect(error.suggestions).toContain('Switch to active mode (PORT) if the server cannot report a passive address.');
    });

    it('should accept a custom reason', () => {
      const error = new MalformedAddressError('(300,0,0,1,4,1)', 'every number must be between 0 and 255');
      expect(error.message).toBe('Malformed address in "(300,0,0,1,4,1)": every number must be between 0 and 255');
    });
  });

  describe('InvalidResponseError', () => {
    it('should name the command when given', () => {
      const error = new InvalidResponseError('garbage', 'NOOP');
      expect(error.message).toBe('Invalid response to NOOP: garbage');
      expect(error.response).toBe('garbage');
    });

    it('should work without a command', () => {
      expect(new InvalidResponseError('garbage').message).toBe('Invalid response: garbage');
    });
  });

  describe('FtpCommandError', () => {
    it('should treat 4xx replies as retriable', () => {
      const error = new FtpCommandError('STOR', 421, 'Service not available');
      expect(error.name).toBe('FtpCommandError');
      expect(error.message).toBe('STOR failed with 421 Service not available');
      expect(error.code).toBe(421);
      expect(error.command).toBe('STOR');
      expect(error.replyMessage).toBe('Service not available');
      expect(error.retriable).toBe(true);
      expect(error.suggestions).toContain('The failure is transient; retry the command.');
    });

    it('should treat 5xx replies as permanent', () => {
      const error = new FtpCommandError('DELE', 550, 'Permission denied');
      expect(error.retriable).toBe(false);
      expect(error.suggestions).toContain('Verify the account has permission for this operation.');
    });

    it('should not leave a trailing space for empty messages', () => {
      expect(new FtpCommandError('RETR', 550, '').message).toBe('RETR failed with 550');
    });
  });

  describe('ValidationError', () => {
    it('should keep field and value', () => {
      const error = new ValidationError('Port out of range', { field: 'port', value: 70000 });
      expect(error.name).toBe('ValidationError');
      expect(error.field).toBe('port');
      expect(error.value).toBe(70000);
    });
  });

  describe('ConfigurationError', () => {
    it('should keep the config key', () => {
      const error = new ConfigurationError('Invalid connection mode', { configKey: 'connectionMode' });
      expect(error.name).toBe('ConfigurationError');
      expect(error.configKey).toBe('connectionMode');
      expect(error.suggestions).toContain('Check the options object or FTPWIRE_* environment variables.');
    });
  });
});
