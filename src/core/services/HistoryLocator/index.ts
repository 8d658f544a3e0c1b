export { HistoryLocatorTag, HistoryLocatorLive } from "./HistoryLocator";
export type { HistoryLocator } from "./HistoryLocator";
