/**
 * @wanwatch/core - Shared domain types
 */

/** Which of the two uplinks an interface serves. */
export type UplinkRole = 'primary' | 'secondary';

export const UPLINK_ROLES: readonly UplinkRole[] = ['primary', 'secondary'];

export interface Uplink {
  role: UplinkRole;
  /** OS interface name, e.g. "eth0". */
  interface: string;
  /** Short name used in log lines, e.g. "WAN1". */
  label: string;
}

/**
 * Which uplink carries the default route, as far as this controller's own
 * route is concerned. "secondary" means the failover route is installed.
 */
export type RouteState = 'primary' | 'secondary';

/** A value per uplink role. */
export type PerUplink<T> = Record<UplinkRole, T>;
