/**
 * PASV/PORT address encoding
 *
 * Both commands describe an endpoint as six decimal numbers:
 * four host octets followed by the high and low byte of the port.
 */

import { MalformedAddressError, ValidationError } from '../../core/errors.js';

export interface DataAddress {
  host: string;
  port: number;
}

// Servers wrap the tuple in arbitrary prose, so the match is unanchored
const ADDRESS_TUPLE = /(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)/;

/**
 * Extract the data address from a PASV reply
 *
 * @example
 * ```typescript
 * parsePassiveAddress('227 Entering Passive Mode (192,168,1,10,4,1).');
 * // { host: '192.168.1.10', port: 1025 }
 * ```
 */
export function parsePassiveAddress(line: string): DataAddress {
  const match = line.match(ADDRESS_TUPLE);
  if (!match) {
    throw new MalformedAddressError(line);
  }

  const numbers = match.slice(1, 7).map((group) => parseInt(group, 10));
  if (numbers.some((n) => n > 255)) {
    throw new MalformedAddressError(line, 'every number must be between 0 and 255');
  }

  return {
    host: numbers.slice(0, 4).join('.'),
    port: numbers[4] * 256 + numbers[5],
  };
}

/**
 * Build the argument of a PORT command
 *
 * @example
 * ```typescript
 * buildActiveCommandArgument('10.0.0.5', 50000); // '10,0,0,5,195,80'
 * ```
 */
export function buildActiveCommandArgument(host: string, port: number): string {
  const octets = host.split('.');
  if (octets.length !== 4 || octets.some((octet) => !/^\d{1,3}$/.test(octet) || Number(octet) > 255)) {
    throw new ValidationError(`Host must be a dotted-quad IPv4 address: ${host}`, {
      field: 'host',
      value: host,
    });
  }

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError(`Port must be an integer between 0 and 65535: ${port}`, {
      field: 'port',
      value: port,
    });
  }

  const portHi = Math.floor(port / 256);
  const portLo = port % 256;
  return [...octets, portHi, portLo].join(',');
}
