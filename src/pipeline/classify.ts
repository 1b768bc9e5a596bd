import type { CodecRegistry } from '../codec/registry.js';
import { ClientError } from '../error/clientError.js';
import type { ResponseError } from '../error/responseError.js';
import { ServerError } from '../error/serverError.js';
import { UnexpectedStatusError } from '../error/unexpectedStatusError.js';
import type { HttpResponse } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Classifies the final response of a call: 2xx and 3xx succeed, 4xx is a {@link ClientError},
 * 5xx a {@link ServerError}, anything else an {@link UnexpectedStatusError}.
 * Status alone never triggers a retry. `codecs` become the default of the error's `parse`.
 */
export function classifyResponse(
  response: HttpResponse,
  codecs?: CodecRegistry,
): SafeWrap<ResponseError, HttpResponse> {
  const { status } = response;
  const opts = { codecs };
  if (status >= 200 && status < 400) {
    return [null, response];
  }

  if (status >= 400 && status < 500) {
    return [new ClientError(response, undefined, opts), null];
  }

  if (status >= 500 && status < 600) {
    return [new ServerError(response, undefined, opts), null];
  }

  return [new UnexpectedStatusError(response, undefined, opts), null];
}
