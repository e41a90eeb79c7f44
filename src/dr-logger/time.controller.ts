import { Controller, Get } from '@nestjs/common';
import { DrLoggerService } from './dr-logger.service';

@Controller('time')
export class TimeController {
  constructor(private readonly drLoggerService: DrLoggerService) {}

  /**
   * Server time as Unix seconds, for clients lining up their own
   * timestamps with the logged rows.
   */
  @Get()
  currentTime(): { time: number } {
    return { time: this.drLoggerService.currentTime() };
  }
}
