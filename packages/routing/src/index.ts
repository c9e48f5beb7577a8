/**
 * @wanwatch/routing - Default-route inspection and failover route control
 *
 * @packageDocumentation
 */

// Parser - iproute2 text output
export {
  parseRouteLine,
  parseRouteTable,
  parseInterfaceAddresses,
  type RouteEntry,
} from './ip-parser.js';

// Table - queries and mutations through `ip`
export {
  IpRouteTable,
  type RouteTable,
  type DefaultRouteSpec,
  type DefaultRouteSelector,
} from './route-table.js';

// Services - tunnel restart after failback
export {
  InitScriptServiceController,
  type ServiceController,
} from './service-control.js';

// Controller - the route this daemon owns
export {
  RouteController,
  type RouteControllerOptions,
} from './route-controller.js';
