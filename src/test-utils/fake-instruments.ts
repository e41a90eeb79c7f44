/**
 * In-process stand-ins for instrument servers.
 *
 * Handlers are plain functions; throw a RemoteCallError (see remoteError)
 * to simulate a server-side failure.
 */
import {
  InstrumentConnection,
  InstrumentServer,
  RemoteCallError,
  RemoteRequest,
  UnknownServerError,
} from '../instruments/interfaces/instrument.interface';

export type SettingHandler = (args: unknown[], context: string) => unknown;

export interface RecordedCall {
  setting: string;
  args: unknown[];
  context: string;
}

export class FakeInstrumentServer implements InstrumentServer {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, SettingHandler>();

  constructor(readonly name: string) {}

  on(setting: string, handler: SettingHandler): this {
    this.handlers.set(setting, handler);
    return this;
  }

  /** Answer a setting with a fixed value. */
  reply(setting: string, value: unknown): this {
    return this.on(setting, () => value);
  }

  callsTo(setting: string): RecordedCall[] {
    return this.calls.filter((c) => c.setting === setting);
  }

  async call(request: RemoteRequest, context: string): Promise<unknown> {
    const args = request.args ?? [];
    this.calls.push({ setting: request.setting, args, context });

    const handler = this.handlers.get(request.setting);
    if (!handler) {
      throw remoteError(
        this.name,
        request.setting,
        'NotFoundError',
        `Setting '${request.setting}' not found`,
      );
    }
    return await handler(args, context);
  }

  async packet(requests: RemoteRequest[], context: string): Promise<unknown[]> {
    const results: unknown[] = [];
    for (const request of requests) {
      results.push(await this.call(request, context));
    }
    return results;
  }
}

export class FakeInstrumentConnection implements InstrumentConnection {
  private readonly servers = new Map<string, FakeInstrumentServer>();
  private readonly nodes = new Set<string>();
  private contextCount = 0;

  addServer(name: string): FakeInstrumentServer {
    const server = new FakeInstrumentServer(name);
    this.servers.set(name, server);
    return server;
  }

  removeServer(name: string): void {
    this.servers.delete(name);
  }

  /** Register a node server (`node_<name>`) so the node counts as reachable. */
  addNode(node: string): this {
    this.nodes.add(`node_${node.toLowerCase()}`);
    return this;
  }

  listServers(): Promise<string[]> {
    return Promise.resolve([...this.nodes, ...this.servers.keys()]);
  }

  getServer(name: string): Promise<InstrumentServer> {
    const server = this.servers.get(name);
    if (!server) {
      return Promise.reject(new UnknownServerError(name));
    }
    return Promise.resolve(server);
  }

  createContext(): string {
    this.contextCount++;
    return `ctx-${this.contextCount}`;
  }
}

export function remoteError(
  serverName: string,
  setting: string,
  type: string,
  message: string,
): RemoteCallError {
  return new RemoteCallError(serverName, setting, type, message);
}

export function q(value: number, unit: string): { value: number; unit: string } {
  return { value, unit };
}

/**
 * Diode server answering `temperatures` with eight readings in K.
 */
export function addDiodeServer(
  connection: FakeInstrumentConnection,
  temperatures: number[] = [3.9, 4.1, 77.2, 1.6, 0.012, 0.8, 0.7, 1.5],
): FakeInstrumentServer {
  return connection
    .addServer('lakeshore_diodes')
    .reply('temperatures', temperatures.map((t) => q(t, 'K')));
}

/**
 * MKS server with the given gauges, all reading in Torr.
 */
export function addMksServer(
  connection: FakeInstrumentConnection,
  gauges: Record<string, number>,
  name = 'mks_gauge_server',
): FakeInstrumentServer {
  return connection
    .addServer(name)
    .reply('get_gauge_list', Object.keys(gauges))
    .reply(
      'get_readings',
      Object.values(gauges).map((p) => q(p, 'Torr')),
    );
}

/**
 * RuOx bridge with named channels; readings are (quantity, read time) pairs.
 */
export function addRuoxServer(
  connection: FakeInstrumentConnection,
  channels: Record<string, { temperature: number; resistance: number }>,
): FakeInstrumentServer {
  const entries = Object.entries(channels);
  const readTime = 1718445600;
  return connection
    .addServer('lakeshore_ruox')
    .reply(
      'temperatures',
      entries.map(([, c]) => [q(c.temperature, 'K'), readTime]),
    )
    .reply(
      'resistances',
      entries.map(([, c]) => [q(c.resistance, 'Ohm'), readTime]),
    )
    .reply(
      'named_temperatures',
      entries.map(([name, c]) => [name, [q(c.temperature, 'K'), readTime]]),
    )
    .reply(
      'named_resistances',
      entries.map(([name, c]) => [name, [q(c.resistance, 'Ohm'), readTime]]),
    );
}
