import { Logger } from '@nestjs/common';
import { z, ZodType, ZodTypeDef } from 'zod';
import { errorMessage } from '../common/errors';
import { Quantity } from '../common/quantity';
import {
  InstrumentServer,
  RemoteRequest,
  UnknownServerError,
} from '../instruments/interfaces/instrument.interface';
import {
  isDeviceNotSelected,
  NoSuchDeviceError,
  SourceNotFoundError,
  VariableDescriptor,
  WatcherError,
  WatcherInit,
  WatcherOptions,
} from './interfaces/watcher.interface';

/** list_devices reply: (id, name) pairs */
const DeviceListSchema = z.array(z.tuple([z.number(), z.string()]));

type ReplySchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * WatchedSource - proxy for one instrument server we pull data from.
 *
 * Subclasses implement the kind-specific read and variable discovery;
 * this base class owns server resolution and the device-selection retry:
 *
 * 1. Run the read. An unknown server surfaces as SourceNotFoundError.
 * 2. If the server answers DeviceNotSelectedError, select a device
 *    (configured name, exact then substring match, or the server default)
 *    and run the read exactly once more.
 * 3. Anything else propagates as a WatcherError carrying the source kind.
 *
 * `active` only reports whether the last read succeeded.
 */
export abstract class WatchedSource {
  protected readonly logger: Logger;
  private isActive = false;
  private released = false;

  constructor(protected readonly init: WatcherInit) {
    this.logger = new Logger(
      `${this.constructor.name}:${init.config.sourceKind}`,
    );
  }

  get sourceKind(): string {
    return this.init.config.sourceKind;
  }

  get node(): string {
    return this.init.config.node;
  }

  get active(): boolean {
    return this.isActive;
  }

  protected get options(): WatcherOptions {
    return this.init.config.options;
  }

  /**
   * Variables logged by this source, in the order takePoint() reports them.
   * Called on dataset creation to declare the dataset schema.
   */
  abstract getVariables(): Promise<VariableDescriptor[]>;

  /**
   * One kind-specific read, one value per declared variable.
   */
  protected abstract readPoint(): Promise<Quantity[]>;

  async takePoint(): Promise<Quantity[]> {
    if (this.released) {
      throw new WatcherError(this.sourceKind, 'Watcher has been released');
    }

    try {
      try {
        return this.markActive(await this.readPoint());
      } catch (error) {
        if (!isDeviceNotSelected(error)) {
          throw error;
        }
        this.logger.warn('No device selected, selecting one and retrying');
        await this.selectDevice();
        return this.markActive(await this.readPoint());
      }
    } catch (error) {
      this.isActive = false;
      throw this.toWatcherError(error);
    }
  }

  /**
   * Drop this watcher at session shutdown. Later reads fail.
   */
  release(): void {
    this.released = true;
    this.isActive = false;
  }

  /**
   * Call a setting on this watcher's server and validate the reply.
   */
  protected async call<T>(
    setting: string,
    schema: ReplySchema<T>,
    args: unknown[] = [],
  ): Promise<T> {
    const server = await this.server();
    const reply = await server.call({ setting, args }, this.init.context);
    return this.parseReply(setting, schema, reply);
  }

  /**
   * Send several settings in one request. Replies are returned unparsed,
   * in request order.
   */
  protected async packet(requests: RemoteRequest[]): Promise<unknown[]> {
    const server = await this.server();
    return server.packet(requests, this.init.context);
  }

  protected parseReply<T>(
    setting: string,
    schema: ReplySchema<T>,
    reply: unknown,
  ): T {
    const result = schema.safeParse(reply);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where =
        issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new WatcherError(
        this.sourceKind,
        `Malformed reply to ${setting}${where}: ${issue?.message ?? 'invalid'}`,
      );
    }
    return result.data;
  }

  private server(): Promise<InstrumentServer> {
    return this.init.connection.getServer(this.sourceKind);
  }

  private async selectDevice(): Promise<void> {
    const configured = this.options.device;

    if (configured === undefined) {
      this.logger.log('Selecting default device');
      await this.call('select_device', z.unknown());
      return;
    }

    const wanted = String(configured);
    const devices = await this.call('list_devices', DeviceListSchema);
    const names = devices.map(([, name]) => name);
    const match = names.includes(wanted)
      ? wanted
      : names.find((name) => name.includes(wanted));

    if (match === undefined) {
      throw new NoSuchDeviceError(this.sourceKind, wanted);
    }

    this.logger.log(`Selecting device: ${match}`);
    await this.call('select_device', z.unknown(), [match]);
  }

  private markActive(reading: Quantity[]): Quantity[] {
    this.isActive = true;
    return reading;
  }

  private toWatcherError(error: unknown): WatcherError {
    if (error instanceof WatcherError) {
      return error;
    }
    if (error instanceof UnknownServerError) {
      return new SourceNotFoundError(this.sourceKind, error);
    }
    return new WatcherError(this.sourceKind, errorMessage(error), error);
  }
}
