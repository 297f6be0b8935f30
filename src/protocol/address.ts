// Listen address parsing: "scheme://address".
//
// The scheme is a network token (tcp, udp, ip, optionally suffixed 4 or 6)
// or a local-socket token (unix, unixgram, unixpacket). Matching is
// case-insensitive.

import { InvalidAddressError, UnsupportedNetworkError } from '../errors/index.js';

const ADDRESS_PATTERN = /^((?:(?:tcp|udp|ip)[46]?)|(?:unix(?:gram|packet)?)):\/\/(.+)$/i;

export interface ListenAddress {
  /** Lower-cased scheme, e.g. "tcp" or "unix" */
  network: string;
  /** Everything after "://" */
  address: string;
}

export function isListenAddress(value: string): boolean {
  return ADDRESS_PATTERN.test(value);
}

export function parseListenAddress(value: string): ListenAddress {
  const match = ADDRESS_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new InvalidAddressError(value);
  }
  return { network: match[1].toLowerCase(), address: match[2] };
}

export function isLocalSocket(address: ListenAddress): boolean {
  return address.network.startsWith('unix');
}

/** gRPC target string for an address; only stream networks gRPC can serve on are accepted. */
export function grpcTarget(listen: ListenAddress): string {
  switch (listen.network) {
    case 'tcp':
    case 'tcp4':
    case 'tcp6':
      return listen.address;
    case 'unix':
      return `unix:${listen.address}`;
    default:
      throw new UnsupportedNetworkError(listen.network);
  }
}
