import { HttpError } from './http-error.js';
import { HTTP_STATUS } from '../../config/constants.js';

/**
 * 404 for a path no declared route matches under any method
 */
export class RouteNotFoundError extends HttpError {
  public readonly path: string;

  constructor(path: string, cause: Error | null = null) {
    super(`Route ${path} not found`, HTTP_STATUS.NOT_FOUND, cause);
    this.path = path;
  }
}
