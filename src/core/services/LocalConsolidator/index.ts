export {
  LocalConsolidatorTag,
  LocalConsolidatorLive,
  LinkOutcome,
  HostDirUnavailable
} from "./LocalConsolidator";
export type { LocalConsolidator, LocalConsolidation, ConsolidateError } from "./LocalConsolidator";
