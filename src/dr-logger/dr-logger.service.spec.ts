import { ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { SETUPS_CONFIG, SetupDefinition } from '../config/setups.config';
import { DATASET_STORE } from '../datasets/interfaces/dataset-store.interface';
import { INSTRUMENT_CONNECTION } from '../instruments/interfaces/instrument.interface';
import {
  addDiodeServer,
  addMksServer,
  FakeInstrumentConnection,
  FakeInstrumentServer,
  InMemoryDatasetStore,
} from '../test-utils';
import { WatcherRegistry } from '../watchers/watcher.registry';
import { DrLoggerService } from './dr-logger.service';

const setup = (
  name: string,
  sources: { label: string; sourceKind: string }[],
): SetupDefinition => ({
  name,
  sources: sources.map(({ label, sourceKind }) => ({
    label,
    config: { sourceKind, node: name, options: {} },
  })),
  datasetPath: ['', 'DR', name],
  datasetName: `${name} log - [t]`,
  timeInterval: 60,
});

describe('DrLoggerService', () => {
  let service: DrLoggerService;
  let connection: FakeInstrumentConnection;
  let store: InMemoryDatasetStore;
  let diodes: FakeInstrumentServer;
  let autostart: boolean;

  const SETUPS: SetupDefinition[] = [
    setup('Ivan', [{ label: 'diodes', sourceKind: 'lakeshore_diodes' }]),
    setup('Jules', [
      { label: 'gauges', sourceKind: 'mks_gauge_server' },
      { label: 'diodes', sourceKind: 'lakeshore_diodes' },
    ]),
    setup('Legacy', [{ label: 'bridge', sourceKind: 'lakeshore_370' }]),
  ];

  const mockConfigService = {
    get: jest.fn((key: string, fallback?: unknown) =>
      key === 'LOGGING_AUTOSTART' ? autostart : fallback,
    ),
  };

  beforeEach(async () => {
    autostart = false;
    connection = new FakeInstrumentConnection();
    store = new InMemoryDatasetStore();
    connection.addNode('Ivan').addNode('Jules').addNode('Legacy');
    diodes = addDiodeServer(connection);
    addMksServer(connection, { P1: 1e-6 });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DrLoggerService,
        { provide: ConfigService, useValue: mockConfigService },
        { provide: WatcherRegistry, useValue: WatcherRegistry.withDefaults() },
        { provide: INSTRUMENT_CONNECTION, useValue: connection },
        { provide: DATASET_STORE, useValue: store },
        { provide: SETUPS_CONFIG, useValue: SETUPS },
      ],
    }).compile();

    service = module.get<DrLoggerService>(DrLoggerService);
  });

  afterEach(async () => {
    await service.onModuleDestroy();
  });

  describe('discover', () => {
    it('should create a session for every runnable setup', async () => {
      await expect(service.discover()).resolves.toEqual(['Ivan', 'Jules']);
    });

    it('should skip setups whose node is offline', async () => {
      connection = new FakeInstrumentConnection().addNode('ivan');
      const module = await Test.createTestingModule({
        providers: [
          DrLoggerService,
          { provide: ConfigService, useValue: mockConfigService },
          { provide: WatcherRegistry, useValue: WatcherRegistry.withDefaults() },
          { provide: INSTRUMENT_CONNECTION, useValue: connection },
          { provide: DATASET_STORE, useValue: store },
          { provide: SETUPS_CONFIG, useValue: SETUPS },
        ],
      }).compile();
      const offline = module.get<DrLoggerService>(DrLoggerService);

      await expect(offline.discover()).resolves.toEqual(['Ivan']);
    });

    it('should not create a session twice', async () => {
      await service.discover();
      const ivan = service.getSession('Ivan');

      await service.discover();

      expect(service.getSession('Ivan')).toBe(ivan);
    });

    it('should start nothing when servers cannot be listed', async () => {
      jest
        .spyOn(connection, 'listServers')
        .mockRejectedValueOnce(new Error('gateway down'));

      await expect(service.discover()).resolves.toEqual([]);
      expect(service.listSetups()).toEqual([]);
    });

    it('should give each session its own request context', async () => {
      await service.discover();

      await service.takePoint('Ivan');
      await service.takePoint('Jules');

      expect(
        diodes.callsTo('temperatures').map((call) => call.context),
      ).toEqual(['ctx-1', 'ctx-2']);
    });
  });

  describe('onModuleInit', () => {
    it('should leave sessions idle without autostart', async () => {
      await service.onModuleInit();

      expect(service.isLogging('Ivan')).toBe(false);
      expect(store.appendAttempts).toHaveLength(0);
    });

    it('should start logging every session with autostart', async () => {
      autostart = true;

      await service.onModuleInit();

      expect(service.isLogging('Ivan')).toBe(true);
      expect(service.isLogging('Jules')).toBe(true);
    });
  });

  describe('commands', () => {
    beforeEach(async () => {
      await service.discover();
    });

    it('should reject an unknown setup', () => {
      expect(() => service.getSession('Nobody')).toThrow(NotFoundException);
      expect(() => service.getErrors('Nobody')).toThrow('Unknown setup: Nobody');
    });

    it('should write a point on demand', async () => {
      const result = await service.takePoint('Ivan');

      expect(result.written).toBe(true);
      expect(store.created[0].name).toMatch(/^Ivan log - \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/);
      expect(service.listSetups()[0]).toEqual({
        name: 'Ivan',
        logging: false,
        timeInterval: 60,
        dataset: store.created[0].name,
        errors: [],
        sources: [{ sourceKind: 'lakeshore_diodes', node: 'Ivan', active: true }],
      });
    });

    it('should expose the errors of the last cycle', async () => {
      connection.removeServer('mks_gauge_server');

      await service.takePoint('Jules');

      expect(service.getErrors('Jules')).toEqual([
        {
          source: 'mks_gauge_server',
          message: "'mks_gauge_server' server not found",
        },
      ]);
    });

    it('should toggle logging', async () => {
      await expect(service.setLogging('Ivan', true)).resolves.toBe(true);
      await expect(service.setLogging('Ivan', false)).resolves.toBe(false);
      expect(service.isLogging('Ivan')).toBe(false);
    });

    it('should change the time interval', async () => {
      await expect(service.setTimeInterval('Ivan', 2.5)).resolves.toBe(2.5);
      expect(service.getTimeInterval('Ivan')).toBe(2.5);
    });

    it('should report a shut down session as a conflict', async () => {
      await service.getSession('Ivan').shutdown();

      await expect(service.takePoint('Ivan')).rejects.toBeInstanceOf(
        ConflictException,
      );
      await expect(service.setLogging('Ivan', true)).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('should return the current time in seconds', () => {
      const before = Date.now() / 1000;
      const time = service.currentTime();

      expect(time).toBeGreaterThanOrEqual(before);
      expect(time).toBeLessThanOrEqual(Date.now() / 1000);
    });
  });
});
