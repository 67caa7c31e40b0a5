/**
 * Host bridge exports for text-codec
 */

export { HostBridge } from './host-bridge.js';
export type { HostValue } from './host-bridge.js';
