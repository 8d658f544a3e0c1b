export {
  RemoteOrchestratorTag,
  RemoteOrchestratorLive,
  PullState,
  ToolPull,
  probeCommand
} from "./RemoteOrchestrator";
export type {
  RemoteOrchestrator,
  RemoteDiscovery,
  PullOptions,
  PullReport,
  TerminalState
} from "./RemoteOrchestrator";
