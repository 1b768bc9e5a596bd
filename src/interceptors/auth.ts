import type { Context } from '../pipeline/context.js';
import type { Awaitable, Interceptor } from '../pipeline/interceptor.js';
import type { HttpRequest } from '../types/request.js';
import { withHeader } from '../utils/request.js';

/** Options for {@link createAuthInterceptor} */
export interface AuthInterceptorOptions {
  /**
   * Provides the access token; called on every attempt so retries pick up refreshed tokens.
   * `null` sends the request without credentials.
   */
  token: (context: Context) => Awaitable<string | null>;
  /**
   * Produces a proof-of-possession (DPoP) value for the request, sent in the `DPoP` header.
   */
  sign?: (request: HttpRequest, context: Context) => Awaitable<string>;
  /**
   * Authorization scheme.
   * @default 'DPoP' when `sign` is given, 'Bearer' otherwise
   */
  scheme?: string;
  /**
   * Header carrying the token.
   * @default 'Authorization'
   */
  header?: string;
}

/**
 * Adds credentials to every attempt. Provider failures fail the call with a `PreparationError`.
 */
export function createAuthInterceptor({
  token,
  sign,
  scheme = sign ? 'DPoP' : 'Bearer',
  header = 'Authorization',
}: AuthInterceptorOptions): Interceptor {
  return {
    async prepare(request, context) {
      const value = await token(context);
      if (value === null) {
        return request;
      }

      const authorized = withHeader(request, header, scheme ? `${scheme} ${value}` : value);
      if (!sign) {
        return authorized;
      }

      return withHeader(authorized, 'DPoP', await sign(authorized, context));
    },
  };
}
