export { LoggerServiceTag, LoggerServiceLive } from "./LoggerService";
export type { LoggerService, HostOutcome } from "./LoggerService";
