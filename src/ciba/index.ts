export { CibaService, type CibaServiceOptions } from './ciba-service.js';
export { HintResolver, classifyJwtError, type HintResolverOptions, type ResolvedSubject, type HintFailure, type HintFailureReason, type HintType } from './hint-resolver.js';
export {
  LoggingCibaUserNotifier,
  HttpCibaClientNotifier,
  type ICibaUserNotifier,
  type ICibaClientNotifier,
  type HttpCibaClientNotifierOptions,
} from './notification.js';
