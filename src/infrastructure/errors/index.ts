export { HttpError, HandlerError, PayloadTooLargeError } from './http-error.js';
export { MalformedBodyError, MethodNotAllowedError } from './validation-error.js';
export { RouteNotFoundError } from './not-found-error.js';
export {
  InvalidTemplateError,
  RegistryBuildError,
  RegistryFrozenError,
  InvalidBindAddressError,
} from './startup-error.js';
export { toErrorResponse, extractErrorMessage, isHttpError } from './error-handler.js';
export type { ErrorResponseOptions } from './error-handler.js';
