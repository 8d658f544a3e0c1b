export {
  RemoteTransportTag,
  SshTransport,
  RemoteUnreachable,
  RemoteCommandFailed,
  MirrorDestinationUnavailable,
  describeRemoteError,
  buildSshArgs,
  buildRsyncArgs
} from "./RemoteTransport";
export type { RemoteTransport, RemoteError } from "./RemoteTransport";
