/**
 * @wanwatch/core - IPv4 address checks
 */

import { isIP } from 'node:net';

const DOTTED_QUAD_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * True for a dotted-quad IPv4 address with every octet in 0..255.
 *
 * Rejects empty strings, hostnames, CIDR suffixes and out-of-range octets
 * such as "999.999.1.1".
 */
export function isValidIpv4(value: string): boolean {
  const match = DOTTED_QUAD_RE.exec(value);
  if (!match) return false;
  for (let i = 1; i <= 4; i++) {
    if (Number(match[i]) > 255) return false;
  }
  return isIP(value) === 4;
}
