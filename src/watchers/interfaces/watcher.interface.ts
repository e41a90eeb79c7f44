import {
  InstrumentConnection,
  RemoteCallError,
} from '../../instruments/interfaces/instrument.interface';

/**
 * One logged variable, declared to the dataset store as
 * `"label (category) [unit]"`.
 */
export interface VariableDescriptor {
  label: string;
  category: string;
  unit: string;
}

export function formatVariable(variable: VariableDescriptor): string {
  return `${variable.label} (${variable.category}) [${variable.unit}]`;
}

export type WatcherOptionValue = string | number | boolean;

/**
 * Open key/value bag interpreted by the matching watcher kind.
 *
 * Known keys:
 * - device: device name (or part of one) to select on the server
 * - channel: MKS gauge label used for the derived He flow
 * - heFlowRate: multiplier turning that gauge reading into L/h
 */
export type WatcherOptions = Readonly<Record<string, WatcherOptionValue>>;

export interface WatcherConfig {
  /** Instrument server name, e.g. 'lakeshore_ruox' */
  readonly sourceKind: string;
  /** Node hosting the server */
  readonly node: string;
  readonly options: WatcherOptions;
}

/**
 * Everything a watcher needs at construction time.
 */
export interface WatcherInit {
  config: WatcherConfig;
  connection: InstrumentConnection;
  /** Request context shared by every watcher of one session */
  context: string;
}

/**
 * Base error for a failed watcher read. The message is reported as-is
 * in the session's error list, next to `sourceKind`.
 */
export class WatcherError extends Error {
  constructor(
    public readonly sourceKind: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'WatcherError';
  }
}

export class SourceNotFoundError extends WatcherError {
  constructor(sourceKind: string, cause?: unknown) {
    super(sourceKind, `'${sourceKind}' server not found`, cause);
    this.name = 'SourceNotFoundError';
  }
}

export class NoSuchDeviceError extends WatcherError {
  constructor(sourceKind: string, deviceName: string) {
    super(sourceKind, `No such device: ${deviceName}`);
    this.name = 'NoSuchDeviceError';
  }
}

export class NoDataError extends WatcherError {
  constructor(sourceKind: string, message: string) {
    super(sourceKind, message);
    this.name = 'NoDataError';
  }
}

/**
 * True when the server refused a request because no device is selected
 * in the calling context.
 */
export function isDeviceNotSelected(error: unknown): boolean {
  return (
    error instanceof RemoteCallError &&
    (error.remoteType === 'DeviceNotSelectedError' ||
      error.message.includes('DeviceNotSelectedError'))
  );
}
