import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toUnixSeconds } from '../common/clock';
import { errorMessage } from '../common/errors';
import { SETUPS_CONFIG, SetupDefinition } from '../config/setups.config';
import {
  DATASET_STORE,
  DatasetStore,
} from '../datasets/interfaces/dataset-store.interface';
import {
  INSTRUMENT_CONNECTION,
  InstrumentConnection,
} from '../instruments/interfaces/instrument.interface';
import { WatcherRegistry } from '../watchers/watcher.registry';
import {
  CycleResult,
  ErrorRecord,
  LoggingSession,
  SessionShutdownError,
  SourceStatus,
} from './logging-session';

/**
 * Summary of one running setup
 */
export interface SetupSummary {
  name: string;
  logging: boolean;
  timeInterval: number;
  /** Name of the dataset currently written to, if any */
  dataset: string | null;
  errors: ErrorRecord[];
  sources: SourceStatus[];
}

/**
 * DrLoggerService
 *
 * Discovers the configured setups whose instrument servers are reachable,
 * builds one LoggingSession per setup and routes commands to it by name.
 *
 * Discovery runs once at module init. A setup is skipped, with a warning,
 * when one of its sources has no registered watcher or its node is not
 * online.
 */
@Injectable()
export class DrLoggerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DrLoggerService.name);
  private readonly sessions = new Map<string, LoggingSession>();

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: WatcherRegistry,
    @Inject(INSTRUMENT_CONNECTION)
    private readonly connection: InstrumentConnection,
    @Inject(DATASET_STORE)
    private readonly store: DatasetStore,
    @Inject(SETUPS_CONFIG)
    private readonly setups: SetupDefinition[],
  ) {}

  async onModuleInit(): Promise<void> {
    const started = await this.discover();
    if (!this.autostart()) {
      this.logger.log(`${started.length} setup(s) ready, logging not started`);
      return;
    }
    await Promise.all(
      started.map((name) => this.getSession(name).logging(true)),
    );
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all(
      Array.from(this.sessions.values(), (session) => session.shutdown()),
    );
    this.sessions.clear();
  }

  /**
   * Create a session for every configured setup that can run now and has
   * none yet.
   *
   * @returns names of all sessions afterwards
   */
  async discover(): Promise<string[]> {
    let servers: Set<string>;
    try {
      servers = new Set(await this.connection.listServers());
    } catch (error) {
      this.logger.error(
        `Could not list instrument servers, no setup started: ${errorMessage(error)}`,
      );
      return this.listNames();
    }

    for (const setup of this.setups) {
      if (this.sessions.has(setup.name)) {
        continue;
      }

      const problems = this.checkSetup(setup, servers);
      if (problems.length > 0) {
        this.logger.warn(
          `Skipping setup ${setup.name}: ${problems.join('; ')}`,
        );
        continue;
      }

      this.logger.log(`Creating DR logger for ${setup.name}`);
      this.sessions.set(setup.name, this.createSession(setup));
    }
    return this.listNames();
  }

  listSetups(): SetupSummary[] {
    return Array.from(this.sessions.values(), (session) => ({
      name: session.name,
      logging: session.isLogging,
      timeInterval: session.timeInterval,
      dataset: session.currentDataset?.name ?? null,
      errors: session.lastErrors,
      sources: session.sources,
    }));
  }

  /**
   * @throws NotFoundException if no session runs under this name
   */
  getSession(name: string): LoggingSession {
    const session = this.sessions.get(name);
    if (!session) {
      throw new NotFoundException(`Unknown setup: ${name}`);
    }
    return session;
  }

  takePoint(name: string): Promise<CycleResult> {
    return this.guard(this.getSession(name).takePoint());
  }

  newDataset(name: string): Promise<void> {
    return this.getSession(name).newDataset();
  }

  isLogging(name: string): boolean {
    return this.getSession(name).isLogging;
  }

  setLogging(name: string, logging: boolean): Promise<boolean> {
    return this.guard(this.getSession(name).logging(logging));
  }

  getTimeInterval(name: string): number {
    return this.getSession(name).timeInterval;
  }

  setTimeInterval(name: string, seconds: number): Promise<number> {
    return this.getSession(name).setInterval(seconds);
  }

  getErrors(name: string): ErrorRecord[] {
    return this.getSession(name).lastErrors;
  }

  /** Server time as Unix seconds */
  currentTime(): number {
    return toUnixSeconds(new Date());
  }

  private listNames(): string[] {
    return Array.from(this.sessions.keys());
  }

  private checkSetup(setup: SetupDefinition, servers: Set<string>): string[] {
    const problems: string[] = [];

    const unsupported = setup.sources
      .map((source) => source.config.sourceKind)
      .filter((kind) => !this.registry.isSupported(kind));
    if (unsupported.length > 0) {
      problems.push(`no watcher for ${unsupported.join(', ')}`);
    }

    const offline = [
      ...new Set(setup.sources.map((source) => source.config.node)),
    ].filter((node) => !servers.has(`node_${node.toLowerCase()}`));
    if (offline.length > 0) {
      problems.push(`node(s) not online: ${offline.join(', ')}`);
    }

    return problems;
  }

  private createSession(setup: SetupDefinition): LoggingSession {
    const context = this.connection.createContext();
    const watchers = setup.sources.map((source) =>
      this.registry.create({
        config: source.config,
        connection: this.connection,
        context,
      }),
    );

    return new LoggingSession({
      name: setup.name,
      watchers,
      store: this.store,
      datasetPath: setup.datasetPath,
      datasetName: setup.datasetName,
      timeInterval: setup.timeInterval,
    });
  }

  private autostart(): boolean {
    const value = this.configService.get<boolean | string>(
      'LOGGING_AUTOSTART',
      true,
    );
    return value !== false && value !== 'false';
  }

  private async guard<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (error) {
      if (error instanceof SessionShutdownError) {
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }
}
