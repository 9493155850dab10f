import type { IncomingHttpHeaders } from 'node:http';
import { normalizeError } from '@spo-admin/utils';
import { Logger } from '@nestjs/common';
import type { Dispatcher } from 'undici';
import { concealSitePath } from '../utils/logging.util';

const MAX_LOGGED_BODY_LENGTH = 300;

export function createLoggingInterceptor(
  shouldConcealLogs: boolean,
): Dispatcher.DispatcherComposeInterceptor {
  const logger = new Logger('SharepointHttpInterceptor');

  return (dispatch) => {
    return (opts, handler) => {
      const requestStartTime = Date.now();
      const { method = 'GET', path } = opts;
      const loggedPath = shouldConcealLogs ? concealSitePath(path) : path;
      const origin = String(opts.origin ?? '');

      logger.debug({ msg: 'SharePoint request started', method, origin, path: loggedPath });

      let statusCode: number | undefined;
      let retryAfter: string | undefined;
      const bodyChunks: Buffer[] = [];

      const wrappedHandler: Dispatcher.DispatchHandler = {
        ...handler,

        onRequestStart(controller: Dispatcher.DispatchController, context: unknown): void {
          handler.onRequestStart?.(controller, context);
        },

        onResponseStart(
          controller: Dispatcher.DispatchController,
          responseStatusCode: number,
          headers: IncomingHttpHeaders,
          statusMessage?: string,
        ): void {
          statusCode = responseStatusCode;
          retryAfter = headers['retry-after']?.toString();
          handler.onResponseStart?.(controller, responseStatusCode, headers, statusMessage);
        },

        onResponseData(controller: Dispatcher.DispatchController, dataChunk: Buffer): void {
          if (statusCode !== undefined && statusCode >= 400) {
            bodyChunks.push(dataChunk);
          }
          handler.onResponseData?.(controller, dataChunk);
        },

        onResponseError(controller: Dispatcher.DispatchController, error: Error): void {
          logger.error({
            msg: 'SharePoint request failed with error',
            method,
            origin,
            path: loggedPath,
            error: normalizeError(error).message,
            duration: Date.now() - requestStartTime,
          });
          handler.onResponseError?.(controller, error);
        },

        onResponseEnd(controller: Dispatcher.DispatchController, trailers: IncomingHttpHeaders): void {
          const duration = Date.now() - requestStartTime;

          if (statusCode === undefined || statusCode < 400) {
            logger.debug({
              msg: 'SharePoint request completed',
              method,
              origin,
              path: loggedPath,
              statusCode,
              duration,
            });
          } else if (statusCode === 429 || statusCode === 503) {
            logger.warn({
              msg: 'SharePoint request throttled',
              method,
              origin,
              path: loggedPath,
              statusCode,
              retryAfter: retryAfter ?? 'none',
              duration,
            });
          } else {
            logger.warn({
              msg: 'SharePoint request failed',
              method,
              origin,
              path: loggedPath,
              statusCode,
              duration,
              errorBody: Buffer.concat(bodyChunks).toString('utf-8').slice(0, MAX_LOGGED_BODY_LENGTH),
            });
          }

          handler.onResponseEnd?.(controller, trailers);
        },
      };

      return dispatch(opts, wrappedHandler);
    };
  };
}
