export {
  ReviewQueueError,
  ValidationError,
  DispatchError,
  TransportError,
  GenerationError,
  NotFoundError,
  InvalidStateError,
  PersistenceError,
  toErrorMessage,
  errorKindOf,
} from './errors';
export type { ErrorKind } from './errors';
