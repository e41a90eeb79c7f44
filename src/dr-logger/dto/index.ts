export { LoggingRequestSchema, type LoggingRequest } from './logging-request.dto';
export {
  TimeIntervalRequestSchema,
  type TimeIntervalRequest,
} from './time-interval-request.dto';
