import http from 'http';

/**
 * Continue with the rest of the chain; settles when everything downstream has
 * finished, and rejects with whatever downstream threw. A middleware that
 * consumed the request body passes a replacement request that reads it again.
 */
export type NextFunction = (req?: http.IncomingMessage) => Promise<void>;

export type Middleware = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  next: NextFunction
) => void | Promise<void>;

export type FinalHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse
) => void | Promise<void>;

/**
 * Middleware chain executor. Each middleware receives a `next` it may await,
 * so a wrapping middleware observes the outcome and timing of everything
 * after it. Errors propagate back up to the caller.
 */
export function runMiddlewareChain(
  middlewares: readonly Middleware[],
  req: http.IncomingMessage,
  res: http.ServerResponse,
  finalHandler: FinalHandler
): Promise<void> {
  const dispatch = async (index: number, request: http.IncomingMessage): Promise<void> => {
    if (index >= middlewares.length) {
      await finalHandler(request, res);
      return;
    }

    let called = false;
    const next: NextFunction = (replacement) => {
      if (called) {
        return Promise.reject(new Error('next() called multiple times'));
      }
      called = true;
      return dispatch(index + 1, replacement ?? request);
    };

    await middlewares[index](request, res, next);
  };

  return dispatch(0, req);
}
