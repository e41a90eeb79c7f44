import { BadRequestException, PipeTransform } from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';

/**
 * Validates a request body against a zod schema.
 *
 * @example
 * @Put(':name/logging')
 * setLogging(@Body(new ZodValidationPipe(LoggingRequestSchema)) body: LoggingRequest) {}
 */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; ');
      throw new BadRequestException(`Invalid request body: ${details}`);
    }
    return result.data;
  }
}
