import { z } from 'zod';
import { Quantity, QuantitySchema } from '../../common/quantity';
import { VariableDescriptor } from '../interfaces/watcher.interface';
import { WatchedSource } from '../watched-source';

/** Diode thermometer positions, in the order the monitor reports them. */
export const DIODE_CHANNELS = [
  '4Kin',
  '4Kout',
  '77K',
  'Ret',
  'Mix',
  'Xchg',
  'Still',
  'Pot',
] as const;

const TemperaturesSchema = z.array(QuantitySchema);

/**
 * Lakeshore diode monitor. The channel set is fixed, so variables are
 * known without talking to the server.
 */
export class DiodeArrayWatcher extends WatchedSource {
  getVariables(): Promise<VariableDescriptor[]> {
    return Promise.resolve(
      DIODE_CHANNELS.map((label) => ({ label, category: 'Diode', unit: 'K' })),
    );
  }

  protected readPoint(): Promise<Quantity[]> {
    return this.call('temperatures', TemperaturesSchema);
  }
}
