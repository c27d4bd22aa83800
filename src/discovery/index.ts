/**
 * Discovery subsystem - public exports.
 *
 * @module src/discovery
 */

// Hidden check
export { isHidden } from './hidden';
// Identity keys
export { identityKeyFor, identityKeyToString } from './identity';
// Types
export type {
  DiscoveryEvent,
  DiscoveryObserver,
  DiscoveryOptions,
  IdentityKey,
  TraversalFrame,
} from './types';
// Walker
export { discoverFiles } from './walker';
