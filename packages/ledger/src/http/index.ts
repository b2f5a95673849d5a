/**
 * HTTP Module
 */

export type { RouteOptions } from './routes.js';
export {
  createRoutes,
  errorHandler,
  httpStatusFor,
  parsePurchaseIntent,
  parseRedeemIntent,
  parseTransferRequest,
  parseRefundRequest,
  RequestValidationError,
} from './routes.js';
