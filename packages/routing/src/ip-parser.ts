/**
 * @wanwatch/routing - Parsers for iproute2 text output
 *
 * Route lines (`ip -4 route show ...`) have the shape
 *
 *   [TYPE] DESTINATION { KEYWORD VALUE | FLAG }...
 *
 * e.g. `default via 192.168.2.1 dev eth1 proto dhcp src 192.168.2.10 metric 20`.
 * When the query itself is filtered by `dev`, iproute2 leaves `dev` out of
 * each line; the caller passes that device as `defaultDevice`. A line with no
 * `metric` keyword has metric 0. Unknown keywords are skipped with their
 * value so later fields still parse.
 */

export interface RouteEntry {
  /** Route type when printed (`unreachable`, `blackhole`, ...), else "unicast". */
  type: string;
  /** "default" or a prefix such as "10.0.0.0/8". */
  destination: string;
  gateway: string | null;
  device: string | null;
  metric: number;
  protocol: string | null;
  source: string | null;
}

const ROUTE_TYPES = new Set([
  'unicast',
  'local',
  'broadcast',
  'multicast',
  'throw',
  'unreachable',
  'prohibit',
  'blackhole',
  'nat',
  'anycast',
]);

/** Keywords followed by exactly one value. */
const VALUE_KEYWORDS = new Set([
  'via',
  'dev',
  'proto',
  'metric',
  'src',
  'scope',
  'table',
  'pref',
  'expires',
  'mtu',
  'advmss',
  'realm',
  'realms',
  'weight',
  'nhid',
  'from',
  'tos',
  'dsfield',
  'hoplimit',
  'initcwnd',
  'initrwnd',
  'rtt',
  'rttvar',
  'window',
  'cwnd',
  'ssthresh',
  'features',
  'quickack',
  'congctl',
  'fastopen_no_cookie',
  'vrf',
]);

/**
 * Parse one route line. Returns null for blank lines and for lines that do
 * not start with a destination.
 */
export function parseRouteLine(line: string, defaultDevice: string | null = null): RouteEntry | null {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  let i = 0;
  let type = 'unicast';
  const first = tokens[0];
  if (first !== undefined && ROUTE_TYPES.has(first) && tokens.length > 1) {
    type = first;
    i = 1;
  }

  const destination = tokens[i];
  if (!destination || VALUE_KEYWORDS.has(destination)) return null;
  i++;

  const entry: RouteEntry = {
    type,
    destination,
    gateway: null,
    device: defaultDevice,
    metric: 0,
    protocol: null,
    source: null,
  };

  while (i < tokens.length) {
    const keyword = tokens[i];

    if (keyword === undefined || !VALUE_KEYWORDS.has(keyword)) {
      // Bare flag such as onlink, linkdown, dead
      i++;
      continue;
    }

    let value = tokens[i + 1];
    i += 2;

    // Newer iproute2 may print `via inet 192.0.2.1`
    if (keyword === 'via' && (value === 'inet' || value === 'inet6')) {
      value = tokens[i];
      i++;
    }
    if (value === undefined) break;

    switch (keyword) {
      case 'via':
        entry.gateway = value;
        break;
      case 'dev':
        entry.device = value;
        break;
      case 'proto':
        entry.protocol = value;
        break;
      case 'src':
        entry.source = value;
        break;
      case 'metric': {
        const metric = Number(value);
        if (Number.isInteger(metric) && metric >= 0) entry.metric = metric;
        break;
      }
      default:
        break;
    }
  }

  return entry;
}

/**
 * Parse the full output of `ip route show`. Zero, one or many entries.
 */
export function parseRouteTable(output: string, defaultDevice: string | null = null): RouteEntry[] {
  const entries: RouteEntry[] = [];
  for (const line of output.split('\n')) {
    const entry = parseRouteLine(line, defaultDevice);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Extract the IPv4 addresses (CIDR form) from `ip -4 addr show dev X`.
 *
 *   2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 ...
 *       inet 192.168.1.2/24 brd 192.168.1.255 scope global eth0
 */
export function parseInterfaceAddresses(output: string): string[] {
  const addresses: string[] = [];
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('inet ')) continue;
    const cidr = trimmed.split(/\s+/)[1];
    if (cidr) addresses.push(cidr);
  }
  return addresses;
}
