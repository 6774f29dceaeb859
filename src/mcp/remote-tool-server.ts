/**
 * A tool as advertised by a remote server
 */
export interface RemoteToolInfo {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * A connected tool provider reachable outside the process. `id` doubles as
 * the origin identifier of every tool it advertises.
 */
export interface RemoteToolServer {
  readonly id: string;
  readonly tools: RemoteToolInfo[];
  callTool(name: string, args: Record<string, unknown>): Promise<string>;
  close(): Promise<void>;
}
