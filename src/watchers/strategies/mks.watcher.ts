import { z } from 'zod';
import { Quantity, QuantitySchema, quantity } from '../../common/quantity';
import {
  NoDataError,
  VariableDescriptor,
} from '../interfaces/watcher.interface';
import { WatchedSource } from '../watched-source';

const ReadingsSchema = z.array(QuantitySchema);
const GaugeListSchema = z.array(z.string());

export const HE_FLOW_VARIABLE: VariableDescriptor = {
  label: 'He Flow',
  category: 'LHe',
  unit: 'L/h',
};

/**
 * Derived He flow channel. Resolved once, on the first non-empty read,
 * and never re-derived afterwards.
 */
type FlowChannel =
  | { state: 'unresolved' }
  | { state: 'disabled' }
  | { state: 'enabled'; index: number; multiplier: number };

/**
 * MKS Gauge Set Watcher
 *
 * Reads every gauge on an MKS pressure controller. With the options
 * `channel` (a gauge label) and `heFlowRate` (L/h per unit of that
 * gauge's reading), an extra "He Flow" value is appended to each point.
 *
 * Settings used:
 * - get_readings   -> Quantity[] (one per gauge)
 * - get_gauge_list -> string[]   (gauge labels, same order)
 */
export class MksGaugeWatcher extends WatchedSource {
  private flow: FlowChannel = { state: 'unresolved' };

  /** Whether the derived He flow value is being reported. */
  get flowEnabled(): boolean {
    return this.flow.state === 'enabled';
  }

  async getVariables(): Promise<VariableDescriptor[]> {
    const point = await this.takePoint();
    const names = await this.call('get_gauge_list', GaugeListSchema);

    const variables: VariableDescriptor[] = [];
    const gauges = Math.min(names.length, this.gaugeCount(point));
    for (let i = 0; i < gauges; i++) {
      variables.push({
        label: names[i],
        category: 'Pressure',
        unit: point[i].unit,
      });
    }
    if (this.flow.state === 'enabled') {
      variables.push(HE_FLOW_VARIABLE);
    }
    return variables;
  }

  protected async readPoint(): Promise<Quantity[]> {
    const readings = await this.call('get_readings', ReadingsSchema);
    if (readings.length === 0) {
      throw new NoDataError(this.sourceKind, 'MKS server did not return data.');
    }

    if (this.flow.state === 'unresolved') {
      this.flow = await this.resolveFlowChannel();
    }
    if (this.flow.state !== 'enabled') {
      return readings;
    }

    const source = readings[this.flow.index];
    if (source === undefined) {
      throw new NoDataError(
        this.sourceKind,
        `MKS server returned ${readings.length} reading(s), He flow uses gauge ${this.flow.index}`,
      );
    }
    return [
      ...readings,
      quantity(this.flow.multiplier * source.value, HE_FLOW_VARIABLE.unit),
    ];
  }

  private gaugeCount(point: Quantity[]): number {
    return this.flow.state === 'enabled' ? point.length - 1 : point.length;
  }

  private async resolveFlowChannel(): Promise<FlowChannel> {
    const { channel, heFlowRate } = this.options;
    if (typeof channel !== 'string' || typeof heFlowRate !== 'number') {
      return { state: 'disabled' };
    }

    const names = await this.call('get_gauge_list', GaugeListSchema);
    const index = names.indexOf(channel);
    if (index === -1) {
      this.logger.error(
        `Could not find gauge reading named '${channel}', He flow disabled`,
      );
      return { state: 'disabled' };
    }

    this.logger.log(
      `Using gauge reading ${index} (${channel}) for He flow with multiplier ${heFlowRate}`,
    );
    return { state: 'enabled', index, multiplier: heFlowRate };
  }
}
