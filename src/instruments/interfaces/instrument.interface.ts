/**
 * Instrument transport contract.
 *
 * Watchers talk to instrument servers (gauge controllers, diode monitors,
 * resistance bridges) exclusively through these interfaces. Every call is
 * made within a context, which the server uses to keep per-client state
 * such as the currently selected device.
 */

/** Injection token for the active {@link InstrumentConnection}. */
export const INSTRUMENT_CONNECTION = Symbol('INSTRUMENT_CONNECTION');

export interface RemoteRequest {
  /** Setting name on the server, e.g. 'get_readings' */
  setting: string;
  args?: unknown[];
}

export interface InstrumentServer {
  readonly name: string;

  call(request: RemoteRequest, context: string): Promise<unknown>;

  /**
   * Send several requests in one round trip.
   * Results come back in request order.
   */
  packet(requests: RemoteRequest[], context: string): Promise<unknown[]>;
}

export interface InstrumentConnection {
  /** Names of every server currently connected to the manager. */
  listServers(): Promise<string[]>;

  /**
   * Resolve a server proxy by name.
   * @throws UnknownServerError if no server of that name is connected
   */
  getServer(name: string): Promise<InstrumentServer>;

  /** Allocate a fresh request context. */
  createContext(): string;
}

/**
 * Error raised by the remote server while executing a setting.
 * `remoteType` is the server-side error class name, when reported.
 */
export class RemoteCallError extends Error {
  constructor(
    public readonly serverName: string,
    public readonly setting: string,
    public readonly remoteType: string,
    message: string,
  ) {
    super(message);
    this.name = 'RemoteCallError';
  }
}

export class UnknownServerError extends Error {
  constructor(public readonly serverName: string) {
    super(`'${serverName}' server not found`);
    this.name = 'UnknownServerError';
  }
}
