export {
  ConsolidationRootTag,
  ConsolidationRootLive,
  RootListing,
  ToolEntry,
  RootNotWritable,
  RootReadFailed,
  EXCLUSION_MANIFEST,
  MANIFEST_FILE
} from "./ConsolidationRoot";
export type { ConsolidationRoot, HostListing, RootError } from "./ConsolidationRoot";
