export { DiscoveryServiceTag, DiscoveryServiceLive, resolveCursorBase } from "./DiscoveryService";
export type { DiscoveryService } from "./DiscoveryService";
