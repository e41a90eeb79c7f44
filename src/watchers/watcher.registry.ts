import { Logger } from '@nestjs/common';
import { WatcherInit } from './interfaces/watcher.interface';
import { DiodeArrayWatcher } from './strategies/diodes.watcher';
import { MksGaugeWatcher } from './strategies/mks.watcher';
import { RuoxArrayWatcher } from './strategies/ruox.watcher';
import { WatchedSource } from './watched-source';

/**
 * Instrument servers we know how to watch.
 * The test-hack gauge server speaks the same protocol as the real one.
 */
export const SOURCE_KINDS = [
  'mks_gauge_server',
  'mks_gauge_server_testhack',
  'lakeshore_diodes',
  'lakeshore_ruox',
] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export type WatcherFactory = (init: WatcherInit) => WatchedSource;

export class UnknownSourceKindError extends Error {
  constructor(public readonly sourceKind: string) {
    super(`No watcher found for: ${sourceKind}`);
    this.name = 'UnknownSourceKindError';
  }
}

/**
 * Registry mapping a source kind to the watcher that handles it.
 *
 * The set of kinds is closed: a registry is only obtained through
 * withDefaults(), built once at startup and handed to the logger service.
 * Sessions never look watchers up by themselves.
 */
export class WatcherRegistry {
  private readonly logger = new Logger(WatcherRegistry.name);
  private readonly factories = new Map<string, WatcherFactory>();

  private constructor() {}

  /**
   * Registry with every built-in watcher.
   */
  static withDefaults(): WatcherRegistry {
    const defaults: Record<SourceKind, WatcherFactory> = {
      mks_gauge_server: (init) => new MksGaugeWatcher(init),
      mks_gauge_server_testhack: (init) => new MksGaugeWatcher(init),
      lakeshore_diodes: (init) => new DiodeArrayWatcher(init),
      lakeshore_ruox: (init) => new RuoxArrayWatcher(init),
    };

    const registry = new WatcherRegistry();
    for (const kind of SOURCE_KINDS) {
      registry.register(kind, defaults[kind]);
    }
    registry.logger.log(
      `Initialized with watchers: ${registry.kinds().join(', ')}`,
    );
    return registry;
  }

  private register(sourceKind: string, factory: WatcherFactory): void {
    this.factories.set(sourceKind, factory);
  }

  isSupported(sourceKind: string): boolean {
    return this.factories.has(sourceKind);
  }

  kinds(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * @throws UnknownSourceKindError if no watcher handles the source kind
   */
  create(init: WatcherInit): WatchedSource {
    const factory = this.factories.get(init.config.sourceKind);
    if (!factory) {
      throw new UnknownSourceKindError(init.config.sourceKind);
    }
    return factory(init);
  }
}
