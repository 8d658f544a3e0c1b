export { ShellServiceTag, ShellServiceLive, ShellError, renderCommand } from "./ShellService";
export type { ShellService, ShellResult } from "./ShellService";
