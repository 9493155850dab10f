import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Agent, type Dispatcher, interceptors } from 'undici';
import type { Config } from '../config';
import { shouldConcealLogs } from '../utils/logging.util';
import { createLoggingInterceptor } from './logging.interceptor';

export const SHAREPOINT_DISPATCHER = Symbol('SHAREPOINT_DISPATCHER');

export function createSharepointDispatcher(configService: ConfigService<Config, true>): Dispatcher {
  const timeoutMs = configService.get('sharepoint.requestTimeoutSeconds', { infer: true }) * 1000;
  const agent = new Agent({
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    connectTimeout: 15_000,
  });

  const interceptorsInCallingOrder = [
    interceptors.redirect({ maxRedirections: 10 }),
    interceptors.retry({
      maxRetries: configService.get('sharepoint.maxRetries', { infer: true }),
      minTimeout: 2_000,
      // Nothing the console sends modifies SharePoint; RenderListDataAsStream is a read over POST.
      methods: ['GET', 'POST'],
      statusCodes: [429, 500, 502, 503, 504],
    }),
    createLoggingInterceptor(shouldConcealLogs(configService)),
  ];
  return agent.compose(interceptorsInCallingOrder.reverse());
}

export const sharepointDispatcherProvider: FactoryProvider<Dispatcher> = {
  provide: SHAREPOINT_DISPATCHER,
  useFactory: createSharepointDispatcher,
  inject: [ConfigService],
};
