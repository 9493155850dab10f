import { Inject, Injectable } from '@nestjs/common';
import type { Dispatcher } from 'undici';
import type { z } from 'zod';
import { type AuthCookies, toCookieHeader } from '../auth/auth-cookies';
import { HTTP_STATUS_OK_MAX } from '../constants/defaults.constants';
import { SHAREPOINT_DISPATCHER } from './sharepoint-dispatcher.factory';
import { SharepointHttpError } from './sharepoint-http.error';

const ODATA_JSON = 'application/json;odata=nometadata';
const MAX_ERROR_SNIPPET_LENGTH = 200;

export interface SharepointRequest<T extends z.ZodType> {
  url: string;
  cookies: Pick<AuthCookies, 'fedAuth' | 'rtFa'>;
  schema: T;
  method?: 'GET' | 'POST';
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * Cookie-authenticated access to the SharePoint REST API of any site the cookies are valid for.
 */
@Injectable()
export class SharepointRestHttpService {
  public constructor(@Inject(SHAREPOINT_DISPATCHER) private readonly dispatcher: Dispatcher) {}

  public async requestJson<T extends z.ZodType>({
    url,
    cookies,
    schema,
    method = 'GET',
    body,
    signal,
  }: SharepointRequest<T>): Promise<z.output<T>> {
    const target = new URL(url);
    const { statusCode, body: responseBody } = await this.dispatcher.request({
      origin: target.origin,
      path: `${target.pathname}${target.search}`,
      method,
      headers: {
        Accept: ODATA_JSON,
        Cookie: toCookieHeader(cookies),
        ...(body === undefined ? {} : { 'Content-Type': ODATA_JSON }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });

    if (statusCode < 200 || statusCode > HTTP_STATUS_OK_MAX) {
      const errorText = await responseBody.text();
      throw new SharepointHttpError(statusCode, errorText.slice(0, MAX_ERROR_SNIPPET_LENGTH));
    }

    const payload: unknown = await responseBody.json();
    return schema.parse(payload);
  }
}
