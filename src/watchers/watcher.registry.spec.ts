import { FakeInstrumentConnection } from '../test-utils';
import { WatcherInit } from './interfaces/watcher.interface';
import { DiodeArrayWatcher } from './strategies/diodes.watcher';
import { MksGaugeWatcher } from './strategies/mks.watcher';
import { RuoxArrayWatcher } from './strategies/ruox.watcher';
import {
  SOURCE_KINDS,
  UnknownSourceKindError,
  WatcherRegistry,
} from './watcher.registry';

describe('WatcherRegistry', () => {
  const connection = new FakeInstrumentConnection();

  const init = (sourceKind: string): WatcherInit => ({
    config: { sourceKind, node: 'DR', options: {} },
    connection,
    context: 'ctx-1',
  });

  it('should register every built-in source kind', () => {
    const registry = WatcherRegistry.withDefaults();

    expect(registry.kinds()).toEqual([...SOURCE_KINDS]);
  });

  it.each([
    { kind: 'mks_gauge_server', expected: MksGaugeWatcher },
    { kind: 'mks_gauge_server_testhack', expected: MksGaugeWatcher },
    { kind: 'lakeshore_diodes', expected: DiodeArrayWatcher },
    { kind: 'lakeshore_ruox', expected: RuoxArrayWatcher },
  ])('should create the watcher for $kind', ({ kind, expected }) => {
    const watcher = WatcherRegistry.withDefaults().create(init(kind));

    expect(watcher).toBeInstanceOf(expected);
    expect(watcher.sourceKind).toBe(kind);
  });

  it('should reject an unknown source kind', () => {
    const registry = WatcherRegistry.withDefaults();

    expect(registry.isSupported('keithley_2400')).toBe(false);
    expect(() => registry.create(init('keithley_2400'))).toThrow(
      UnknownSourceKindError,
    );
    expect(() => registry.create(init('keithley_2400'))).toThrow(
      'No watcher found for: keithley_2400',
    );
  });

  it('should support only the built-in source kinds', () => {
    const registry = WatcherRegistry.withDefaults();

    for (const kind of SOURCE_KINDS) {
      expect(registry.isSupported(kind)).toBe(true);
    }
    expect(registry.isSupported('lakeshore_diodes_2')).toBe(false);
    expect(registry.isSupported('mks_gauge')).toBe(false);
  });
});
