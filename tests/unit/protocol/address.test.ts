import { describe, expect, it } from 'vitest';

import { grpcTarget, isListenAddress, isLocalSocket, parseListenAddress } from '@/protocol/address.js';

import { thrownCode } from '../../helpers/index.js';

describe('parseListenAddress', () => {
  it('splits scheme and address, lower-casing the scheme', () => {
    expect(parseListenAddress('TCP://127.0.0.1:10000')).toEqual({
      network: 'tcp',
      address: '127.0.0.1:10000',
    });
    expect(parseListenAddress('unix:///run/csi.sock')).toEqual({
      network: 'unix',
      address: '/run/csi.sock',
    });
  });

  it.each(['127.0.0.1:10000', 'http://localhost', 'tcp://', 'sctp://host:1'])(
    'rejects %s',
    (value) => {
      expect(isListenAddress(value)).toBe(false);
      expect(thrownCode(() => parseListenAddress(value))).toBe('ROUTER_INVALID_ADDRESS');
    }
  );

  it('accepts the datagram and packet socket schemes', () => {
    expect(isListenAddress('udp6://[::1]:9000')).toBe(true);
    expect(isLocalSocket(parseListenAddress('unixpacket:///tmp/x'))).toBe(true);
    expect(isLocalSocket(parseListenAddress('tcp4://0.0.0.0:1'))).toBe(false);
  });
});

describe('grpcTarget', () => {
  it('maps stream networks to gRPC targets', () => {
    expect(grpcTarget(parseListenAddress('tcp6://[::1]:10000'))).toBe('[::1]:10000');
    expect(grpcTarget(parseListenAddress('unix:///tmp/csi.sock'))).toBe('unix:/tmp/csi.sock');
  });

  it('rejects networks gRPC cannot serve on', () => {
    expect(thrownCode(() => grpcTarget(parseListenAddress('udp://127.0.0.1:1')))).toBe(
      'ROUTER_UNSUPPORTED_NETWORK'
    );
    expect(thrownCode(() => grpcTarget(parseListenAddress('unixgram:///tmp/x')))).toBe(
      'ROUTER_UNSUPPORTED_NETWORK'
    );
  });
});
