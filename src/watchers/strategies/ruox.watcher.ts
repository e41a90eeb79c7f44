import { z } from 'zod';
import { Quantity, QuantitySchema } from '../../common/quantity';
import { VariableDescriptor } from '../interfaces/watcher.interface';
import { WatchedSource } from '../watched-source';

/** Each channel reading is (quantity, ...extra fields such as read time). */
const ChannelReadingsSchema = z.array(
  z.tuple([QuantitySchema]).rest(z.unknown()),
);

/** Named readings: (channel name, (quantity, ...)). */
const NamedReadingsSchema = z.array(
  z.tuple([z.string(), z.tuple([QuantitySchema]).rest(z.unknown())]),
);

/**
 * Lakeshore RuOx bridge.
 *
 * Temperatures and resistances are read together in one packet and
 * reported as two variable groups: every temperature, then every
 * resistance. Channel names are only known once the bridge answers,
 * so getVariables() takes a point first.
 */
export class RuoxArrayWatcher extends WatchedSource {
  async getVariables(): Promise<VariableDescriptor[]> {
    await this.takePoint();

    const temperatures = await this.call(
      'named_temperatures',
      NamedReadingsSchema,
    );
    const resistances = await this.call(
      'named_resistances',
      NamedReadingsSchema,
    );

    return [
      ...temperatures.map(([label, [reading]]) => ({
        label,
        category: 'Ruox',
        unit: reading.unit,
      })),
      ...resistances.map(([label, [reading]]) => ({
        label,
        category: 'Ruox Res',
        unit: reading.unit,
      })),
    ];
  }

  protected async readPoint(): Promise<Quantity[]> {
    const [temperatures, resistances] = await this.packet([
      { setting: 'temperatures' },
      { setting: 'resistances' },
    ]);

    const temps = this.parseReply(
      'temperatures',
      ChannelReadingsSchema,
      temperatures,
    );
    const res = this.parseReply(
      'resistances',
      ChannelReadingsSchema,
      resistances,
    );

    return [...temps.map(([t]) => t), ...res.map(([r]) => r)];
  }
}
