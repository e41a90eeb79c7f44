import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { loadSetupsFile, SETUPS_CONFIG } from '../config/setups.config';
import { DatasetsModule } from '../datasets/datasets.module';
import { InstrumentsModule } from '../instruments/instruments.module';
import { WatcherRegistry } from '../watchers/watcher.registry';
import { DrLoggerController } from './dr-logger.controller';
import { DrLoggerService } from './dr-logger.service';
import { TimeController } from './time.controller';

/**
 * DrLoggerModule
 *
 * Runs one logging session per configured setup and exposes the
 * command endpoints.
 */
@Module({
  imports: [ConfigModule, InstrumentsModule, DatasetsModule],
  controllers: [DrLoggerController, TimeController],
  providers: [
    DrLoggerService,
    {
      provide: WatcherRegistry,
      useFactory: () => WatcherRegistry.withDefaults(),
    },
    {
      provide: SETUPS_CONFIG,
      useFactory: (configService: ConfigService) =>
        loadSetupsFile(
          configService.get<string>('SETUPS_CONFIG_PATH', 'config/setups.json'),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [DrLoggerService],
})
export class DrLoggerModule {}
