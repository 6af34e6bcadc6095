export { ORDER_STATUSES, clientIdOf, isOrderStatus, withStatus } from './order.js';
export type { OrderStatus, OrderEvent } from './order.js';
export {
  PipelineError,
  ConfigError,
  TransportError,
  PublishError,
  DecodeError,
  SendError,
  ProcessingError,
  errorMessage,
} from './errors.js';
export type { PipelineErrorCode, PublishErrorCode } from './errors.js';
