/**
 * Pre-flight validation of lookup targets. Nothing here touches the network:
 * a hostname is checked for shape only, the remote side resolves it.
 */

import { isIP } from 'net';
import { InvalidIpError } from '@ipgeo/utils';

const HOSTNAME_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;
const TOP_LEVEL_LABEL = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/i;
const MAX_HOSTNAME_LENGTH = 253;

/**
 * IPv4 or IPv6 address, without an IPv6 zone ID (`fe80::1%eth0`)
 */
export function isValidIp(value: string): boolean {
  return !value.includes('%') && isIP(value) !== 0;
}

/**
 * True for a dotted hostname whose top-level label is alphabetic
 * (or punycode), so a bare word or a malformed dotted quad is rejected.
 */
export function isValidHostname(value: string): boolean {
  const host = value.endsWith('.') ? value.slice(0, -1) : value;
  if (host.length === 0 || host.length > MAX_HOSTNAME_LENGTH) {
    return false;
  }

  const labels = host.split('.');
  if (labels.length < 2) {
    return false;
  }

  const tld = labels[labels.length - 1];
  return labels.every((label) => HOSTNAME_LABEL.test(label)) && TOP_LEVEL_LABEL.test(tld);
}

export function isValidTarget(value: string): boolean {
  return isValidIp(value) || isValidHostname(value);
}

function describeEntry(value: string, position?: number): string {
  const where = position === undefined ? '' : ` at entry ${position}`;
  return `${where}: ${JSON.stringify(value)}`;
}

/**
 * Accepts an IPv4/IPv6 address or a hostname
 */
export function assertLookupTarget(value: string, position?: number): void {
  if (!isValidTarget(value)) {
    throw new InvalidIpError(
      `Invalid IP address or hostname${describeEntry(value, position)}`,
      value,
      position
    );
  }
}

export function assertDomain(value: string, position?: number): void {
  if (!isValidHostname(value)) {
    throw new InvalidIpError(`Invalid domain${describeEntry(value, position)}`, value, position);
  }
}
