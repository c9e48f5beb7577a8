/**
 * Unit Tests for iproute2 output parsing
 *
 * Tests route lines with and without dev/metric, route types, unknown
 * keywords, and address extraction.
 */
import { describe, it, expect } from 'vitest';
import { parseInterfaceAddresses, parseRouteLine, parseRouteTable } from '@wanwatch/routing';

describe('parseRouteLine', () => {
  it('parses a full default route', () => {
    const entry = parseRouteLine('default via 192.168.2.1 dev eth1 proto dhcp src 192.168.2.10 metric 20');
    expect(entry).toEqual({
      type: 'unicast',
      destination: 'default',
      gateway: '192.168.2.1',
      device: 'eth1',
      metric: 20,
      protocol: 'dhcp',
      source: '192.168.2.10',
    });
  });

  it('uses the default device when dev is omitted', () => {
    const entry = parseRouteLine('default via 10.0.0.1 proto static metric 5', 'eth1');
    expect(entry?.device).toBe('eth1');
    expect(entry?.metric).toBe(5);
  });

  it('treats a missing metric as 0', () => {
    expect(parseRouteLine('default via 10.0.0.1 dev eth0')?.metric).toBe(0);
  });

  it('leaves gateway null for a link-scope route', () => {
    const entry = parseRouteLine('default dev ppp0 scope link', null);
    expect(entry?.gateway).toBeNull();
    expect(entry?.device).toBe('ppp0');
  });

  it('reads the route type prefix', () => {
    const entry = parseRouteLine('unreachable default metric 4278198272');
    expect(entry?.type).toBe('unreachable');
    expect(entry?.destination).toBe('default');
    expect(entry?.metric).toBe(4278198272);
  });

  it('accepts the "via inet" form', () => {
    expect(parseRouteLine('default via inet 192.0.2.1 dev eth1')?.gateway).toBe('192.0.2.1');
  });

  it('skips bare flags and unknown-valued keywords', () => {
    const entry = parseRouteLine('default via 192.0.2.1 dev eth1 onlink pref medium metric 7 linkdown');
    expect(entry?.gateway).toBe('192.0.2.1');
    expect(entry?.metric).toBe(7);
  });

  it('keeps the unvalidated gateway text', () => {
    expect(parseRouteLine('default via 999.999.1.1 dev eth1')?.gateway).toBe('999.999.1.1');
  });

  it('returns null for blank lines', () => {
    expect(parseRouteLine('')).toBeNull();
    expect(parseRouteLine('   ')).toBeNull();
  });

  it('returns null when the line starts with a keyword', () => {
    expect(parseRouteLine('via 10.0.0.1 dev eth0')).toBeNull();
  });
});

describe('parseRouteTable', () => {
  it('parses every non-blank line in order', () => {
    const output = [
      'default via 192.168.1.1 proto dhcp metric 10',
      'default via 192.168.2.1 proto static metric 5',
      '',
    ].join('\n');
    const routes = parseRouteTable(output, 'eth1');
    expect(routes.map((r) => [r.gateway, r.metric, r.device])).toEqual([
      ['192.168.1.1', 10, 'eth1'],
      ['192.168.2.1', 5, 'eth1'],
    ]);
  });

  it('returns an empty list for empty output', () => {
    expect(parseRouteTable('')).toEqual([]);
  });
});

describe('parseInterfaceAddresses', () => {
  it('collects inet addresses in CIDR form', () => {
    const output = [
      '2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc mq state UP',
      '    inet 192.168.1.2/24 brd 192.168.1.255 scope global eth0',
      '       valid_lft forever preferred_lft forever',
      '    inet 10.1.0.2/16 scope global secondary eth0',
    ].join('\n');
    expect(parseInterfaceAddresses(output)).toEqual(['192.168.1.2/24', '10.1.0.2/16']);
  });

  it('ignores inet6 lines', () => {
    expect(parseInterfaceAddresses('    inet6 fe80::1/64 scope link')).toEqual([]);
  });

  it('returns an empty list for an unaddressed interface', () => {
    expect(parseInterfaceAddresses('')).toEqual([]);
  });
});
