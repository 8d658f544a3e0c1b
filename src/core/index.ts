import { Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export type { ToolKind } from "./domain/Tool";
export { TOOL_KINDS, toolDisplayName } from "./domain/Tool";
export type { HistoryLocation } from "./domain/HistoryLocation";
export type { DiscoveryResult, DiscoveryReport } from "./domain/DiscoveryResult";
export { toReport, locationsFor } from "./domain/DiscoveryResult";
export { RemoteHost } from "./domain/RemoteHost";
export type { RemoteHostInit } from "./domain/RemoteHost";

export type {
  RemoteError,
  RemoteUnreachable,
  RemoteCommandFailed,
  MirrorDestinationUnavailable
} from "./services/RemoteTransport";
export type { ConsolidateError, HostDirUnavailable } from "./services/LocalConsolidator";
export type { RootError, RootNotWritable, RootReadFailed } from "./services/ConsolidationRoot";
export type { PullOptions, PullReport } from "./services/RemoteOrchestrator";

import { ShellServiceLive } from "./services/ShellService";
import { SshTransport } from "./services/RemoteTransport";
import { HistoryLocatorLive } from "./services/HistoryLocator";
import { DiscoveryServiceLive } from "./services/DiscoveryService";
import { LocalConsolidatorLive } from "./services/LocalConsolidator";
import { ConsolidationRootLive } from "./services/ConsolidationRoot";
import { RemoteOrchestratorLive } from "./services/RemoteOrchestrator";
import { LoggerServiceLive } from "./services/LoggerService";

export const createAppLayer = () => {
  const Transport = pipe(
    SshTransport,
    Layer.provide(ShellServiceLive),
    Layer.provide(NodeContext.layer)
  );

  return pipe(
    Layer.mergeAll(
      LoggerServiceLive,
      pipe(DiscoveryServiceLive, Layer.provide(HistoryLocatorLive)),
      LocalConsolidatorLive,
      ConsolidationRootLive,
      pipe(
        RemoteOrchestratorLive,
        Layer.provide(Transport),
        Layer.provide(LoggerServiceLive)
      )
    ),
    Layer.provide(NodeContext.layer)
  );
};

export const AppLive = createAppLayer();
