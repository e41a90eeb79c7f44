/**
 * Test utilities
 *
 * ```typescript
 * import { FakeInstrumentConnection, InMemoryDatasetStore } from '../test-utils';
 * ```
 */
export {
  FakeInstrumentConnection,
  FakeInstrumentServer,
  type RecordedCall,
  type SettingHandler,
  remoteError,
  q,
  addDiodeServer,
  addMksServer,
  addRuoxServer,
} from './fake-instruments';
export { InMemoryDatasetStore } from './in-memory-dataset-store';
