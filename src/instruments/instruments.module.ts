import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { INSTRUMENT_CONNECTION } from './interfaces/instrument.interface';
import { InstrumentGatewayClient } from './instrument-gateway.client';

/**
 * InstrumentsModule
 *
 * Provides the connection to the instrument servers. Consumers inject it
 * through the INSTRUMENT_CONNECTION token so tests can swap in a fake.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    InstrumentGatewayClient,
    {
      provide: INSTRUMENT_CONNECTION,
      useExisting: InstrumentGatewayClient,
    },
  ],
  exports: [INSTRUMENT_CONNECTION],
})
export class InstrumentsModule {}
