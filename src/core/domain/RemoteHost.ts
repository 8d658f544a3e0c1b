export const DEFAULT_SSH_PORT = 22;

export interface RemoteHostInit {
  readonly hostname: string;
  readonly user?: string;
  /** Overrides the derived `user@hostname` target */
  readonly sshTarget?: string;
  readonly port?: number;
  readonly identityFile?: string;
}

/**
 * A machine to pull histories from.
 *
 * `sshTarget` is derived once, at construction. Changing `user` or
 * `hostname` afterwards does not re-derive it.
 */
export class RemoteHost {
  hostname: string;
  user: string | undefined;
  port: number;
  identityFile: string | undefined;
  readonly sshTarget: string;

  constructor(init: RemoteHostInit) {
    this.hostname = init.hostname;
    this.user = init.user !== undefined && init.user.length > 0 ? init.user : undefined;
    this.port = init.port ?? DEFAULT_SSH_PORT;
    this.identityFile = init.identityFile;
    this.sshTarget =
      init.sshTarget ?? (this.user !== undefined ? `${this.user}@${this.hostname}` : this.hostname);
  }
}
