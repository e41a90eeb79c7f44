import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  InstrumentConnection,
  InstrumentServer,
  RemoteCallError,
  RemoteRequest,
  UnknownServerError,
} from './interfaces/instrument.interface';

const ServerListSchema = z.object({
  servers: z.array(z.string()),
});

/**
 * Reply to a packet request. `results` holds one entry per request,
 * in request order, when `success` is true.
 */
const PacketReplySchema = z.object({
  success: z.boolean(),
  results: z.array(z.unknown()).optional(),
  error: z
    .object({
      type: z.string().default('Error'),
      message: z.string(),
      setting: z.string().optional(),
    })
    .optional(),
});

/**
 * HTTP client for the instrument gateway.
 *
 * The gateway fronts every instrument server on the lab network. Requests
 * are always sent as packets (a single call is a packet of one), so the
 * gateway sees one HTTP round trip per watcher read.
 *
 * Routes:
 *   GET  /api/servers                 -> { servers: string[] }
 *   POST /api/servers/:name/packet    -> { success, results?, error? }
 */
@Injectable()
export class InstrumentGatewayClient implements InstrumentConnection {
  private readonly logger = new Logger(InstrumentGatewayClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private knownServers = new Set<string>();

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService
      .get<string>('INSTRUMENT_GATEWAY_URL', 'http://localhost:7682')
      .replace(/\/+$/, '');
    this.timeoutMs = Number(
      this.configService.get<number>('INSTRUMENT_REQUEST_TIMEOUT_MS', 10000),
    );
    this.logger.log(
      `Instrument gateway at ${this.baseUrl} (timeout ${this.timeoutMs}ms)`,
    );
  }

  async listServers(): Promise<string[]> {
    const response = await fetch(`${this.baseUrl}/api/servers`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Failed to list servers: ${response.status}`);
    }

    const data = ServerListSchema.parse(await response.json());
    this.knownServers = new Set(data.servers);
    return data.servers;
  }

  async getServer(name: string): Promise<InstrumentServer> {
    if (!this.knownServers.has(name)) {
      await this.listServers();
      if (!this.knownServers.has(name)) {
        throw new UnknownServerError(name);
      }
    }
    return new GatewayServer(name, this);
  }

  createContext(): string {
    return randomUUID();
  }

  /**
   * Send a packet to a server and return its results.
   *
   * @throws UnknownServerError if the gateway no longer knows the server
   * @throws RemoteCallError if the server reports an error for any request
   */
  async send(
    serverName: string,
    requests: RemoteRequest[],
    context: string,
  ): Promise<unknown[]> {
    const url = `${this.baseUrl}/api/servers/${encodeURIComponent(serverName)}/packet`;

    this.logger.debug(
      `Sending ${requests.map((r) => r.setting).join(', ')} to ${serverName}`,
    );

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        context,
        requests: requests.map((r) => ({
          setting: r.setting,
          args: r.args ?? [],
        })),
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 404) {
      this.knownServers.delete(serverName);
      throw new UnknownServerError(serverName);
    }

    const reply = PacketReplySchema.parse(await response.json());
    const settings = requests.map((r) => r.setting).join(', ');

    if (!reply.success || !reply.results) {
      const error = reply.error ?? {
        type: 'Error',
        message: `Request to ${serverName} failed with status ${response.status}`,
      };
      throw new RemoteCallError(
        serverName,
        error.setting ?? settings,
        error.type,
        error.message,
      );
    }

    if (reply.results.length !== requests.length) {
      throw new RemoteCallError(
        serverName,
        settings,
        'ProtocolError',
        `Expected ${requests.length} result(s) from ${serverName}, got ${reply.results.length}`,
      );
    }

    return reply.results;
  }
}

/**
 * Proxy for one server behind the gateway.
 */
class GatewayServer implements InstrumentServer {
  constructor(
    readonly name: string,
    private readonly client: InstrumentGatewayClient,
  ) {}

  async call(request: RemoteRequest, context: string): Promise<unknown> {
    const [result] = await this.client.send(this.name, [request], context);
    return result;
  }

  packet(requests: RemoteRequest[], context: string): Promise<unknown[]> {
    return this.client.send(this.name, requests, context);
  }
}
