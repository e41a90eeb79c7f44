import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Put,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { ErrorRecord } from './logging-session';
import { DrLoggerService, SetupSummary } from './dr-logger.service';
import {
  LoggingRequest,
  LoggingRequestSchema,
  TimeIntervalRequest,
  TimeIntervalRequestSchema,
} from './dto';

/**
 * DrLoggerController
 *
 * Command surface of the running setups.
 *
 * Endpoints:
 * - GET  /setups                        - List running setups
 * - POST /setups/:name/take-point       - Take one point now
 * - POST /setups/:name/new-dataset      - Start a new dataset with the next point
 * - GET  /setups/:name/logging          - Whether the setup is logging
 * - PUT  /setups/:name/logging          - Start or stop logging
 * - GET  /setups/:name/time-interval    - Seconds between points
 * - PUT  /setups/:name/time-interval    - Change the seconds between points
 * - GET  /setups/:name/errors           - Failures of the last cycle
 */
@Controller('setups')
export class DrLoggerController {
  private readonly logger = new Logger(DrLoggerController.name);

  constructor(private readonly drLoggerService: DrLoggerService) {}

  @Get()
  listSetups(): SetupSummary[] {
    return this.drLoggerService.listSetups();
  }

  /**
   * Runs a full cycle out of band. Failures end up in the error list,
   * not in the response.
   */
  @Post(':name/take-point')
  @HttpCode(HttpStatus.NO_CONTENT)
  async takePoint(@Param('name') name: string): Promise<void> {
    const result = await this.drLoggerService.takePoint(name);
    this.logger.log(
      `Point for ${name}: ${result.written ? 'written' : `skipped (${result.errors.length} error(s))`}`,
    );
  }

  @Post(':name/new-dataset')
  @HttpCode(HttpStatus.NO_CONTENT)
  async newDataset(@Param('name') name: string): Promise<void> {
    await this.drLoggerService.newDataset(name);
  }

  @Get(':name/logging')
  getLogging(@Param('name') name: string): { logging: boolean } {
    return { logging: this.drLoggerService.isLogging(name) };
  }

  /**
   * @example
   * PUT /setups/Ivan/logging
   * Body: { "logging": false }
   * Response: { "logging": false }
   */
  @Put(':name/logging')
  async setLogging(
    @Param('name') name: string,
    @Body(new ZodValidationPipe(LoggingRequestSchema)) body: LoggingRequest,
  ): Promise<{ logging: boolean }> {
    this.logger.log(`PUT /setups/${name}/logging ${body.logging}`);
    const logging = await this.drLoggerService.setLogging(name, body.logging);
    return { logging };
  }

  @Get(':name/time-interval')
  getTimeInterval(@Param('name') name: string): { seconds: number } {
    return { seconds: this.drLoggerService.getTimeInterval(name) };
  }

  @Put(':name/time-interval')
  async setTimeInterval(
    @Param('name') name: string,
    @Body(new ZodValidationPipe(TimeIntervalRequestSchema))
    body: TimeIntervalRequest,
  ): Promise<{ seconds: number }> {
    this.logger.log(`PUT /setups/${name}/time-interval ${body.seconds}s`);
    const seconds = await this.drLoggerService.setTimeInterval(
      name,
      body.seconds,
    );
    return { seconds };
  }

  @Get(':name/errors')
  getErrors(@Param('name') name: string): { errors: ErrorRecord[] } {
    return { errors: this.drLoggerService.getErrors(name) };
  }
}
