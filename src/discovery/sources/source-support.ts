import { AppError, errorMessage } from '../../shared/errors.js';
import type { SourceFetchFailure } from '../types.js';

export const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

/** Converts any thrown value into the failure record kept on a fetch result. */
export function toFetchFailure(error: unknown, url?: string): SourceFetchFailure {
  return {
    ...(url !== undefined ? { url } : {}),
    message: errorMessage(error),
    code: error instanceof AppError ? error.code : 'FETCH_ERROR',
  };
}
