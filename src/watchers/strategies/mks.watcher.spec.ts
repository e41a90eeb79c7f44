import {
  addMksServer,
  FakeInstrumentConnection,
  FakeInstrumentServer,
  q,
} from '../../test-utils';
import {
  formatVariable,
  NoDataError,
  WatcherOptions,
} from '../interfaces/watcher.interface';
import { MksGaugeWatcher } from './mks.watcher';

describe('MksGaugeWatcher', () => {
  let connection: FakeInstrumentConnection;
  let server: FakeInstrumentServer;

  const createWatcher = (options: WatcherOptions = {}) =>
    new MksGaugeWatcher({
      config: { sourceKind: 'mks_gauge_server', node: 'DR', options },
      connection,
      context: 'ctx-1',
    });

  beforeEach(() => {
    connection = new FakeInstrumentConnection();
    server = addMksServer(connection, {
      Still: 0.002,
      'He Return': 0.5,
      IVC: 0.000001,
    });
  });

  describe('without a flow channel', () => {
    it('should report one pressure per gauge', async () => {
      const watcher = createWatcher();

      await expect(watcher.takePoint()).resolves.toEqual([
        q(0.002, 'Torr'),
        q(0.5, 'Torr'),
        q(0.000001, 'Torr'),
      ]);
      expect(watcher.flowEnabled).toBe(false);
      expect(server.callsTo('get_gauge_list')).toHaveLength(0);
    });

    it('should declare gauge names as pressure variables', async () => {
      const variables = await createWatcher().getVariables();

      expect(variables.map(formatVariable)).toEqual([
        'Still (Pressure) [Torr]',
        'He Return (Pressure) [Torr]',
        'IVC (Pressure) [Torr]',
      ]);
    });
  });

  describe('with a flow channel', () => {
    const FLOW_OPTIONS = { channel: 'He Return', heFlowRate: 24.7 };

    it('should append the derived He flow to every point', async () => {
      const watcher = createWatcher(FLOW_OPTIONS);

      const point = await watcher.takePoint();

      expect(point).toHaveLength(4);
      expect(point[3].unit).toBe('L/h');
      expect(point[3].value).toBeCloseTo(12.35, 10);
      expect(watcher.flowEnabled).toBe(true);
    });

    it('should resolve the channel only once', async () => {
      const watcher = createWatcher(FLOW_OPTIONS);

      await watcher.takePoint();
      await watcher.takePoint();

      expect(server.callsTo('get_gauge_list')).toHaveLength(1);
      expect(server.callsTo('get_readings')).toHaveLength(2);
    });

    it('should declare the He flow variable after the gauges', async () => {
      const variables = await createWatcher(FLOW_OPTIONS).getVariables();

      expect(variables.map(formatVariable)).toEqual([
        'Still (Pressure) [Torr]',
        'He Return (Pressure) [Torr]',
        'IVC (Pressure) [Torr]',
        'He Flow (LHe) [L/h]',
      ]);
    });

    it('should permanently disable the flow when the gauge is unknown', async () => {
      const watcher = createWatcher({ channel: 'Flowmeter', heFlowRate: 24.7 });

      await expect(watcher.takePoint()).resolves.toHaveLength(3);
      await expect(watcher.takePoint()).resolves.toHaveLength(3);

      expect(watcher.flowEnabled).toBe(false);
      expect(server.callsTo('get_gauge_list')).toHaveLength(1);
    });

    it('should fail when the flow gauge disappears from the readings', async () => {
      const watcher = createWatcher({ channel: 'IVC', heFlowRate: 2 });
      await watcher.takePoint();

      server.reply('get_readings', [q(0.002, 'Torr')]);

      await expect(watcher.takePoint()).rejects.toThrow(
        'MKS server returned 1 reading(s), He flow uses gauge 2',
      );
    });
  });

  it('should raise NoDataError on an empty reading set', async () => {
    server.reply('get_readings', []);
    const watcher = createWatcher();

    const error: unknown = await watcher.takePoint().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoDataError);
    expect(error).toMatchObject({
      sourceKind: 'mks_gauge_server',
      message: 'MKS server did not return data.',
    });
    expect(watcher.active).toBe(false);
  });
});
