/**
 * undici adapter: decorates undici's request().
 *
 * The caller keeps undici's own body object (text(), json(), arrayBuffer() and the rest).
 * Recorded calls are dispatched through an interceptor composed onto the caller's dispatcher
 * (or the global one) that copies body chunks, up to maxPayloadSize, as undici delivers them.
 * The record is written when undici completes or fails the body, or once it passes
 * maxPayloadSize; a body the caller never consumes keeps its record pending.
 */

import { format } from 'url';
import { getGlobalDispatcher } from 'undici';
import type { Dispatcher, request as undiciRequest } from 'undici';
import { logHttpRequest } from '../../core/pipeline/log-http-request';
import type { RecordingOptions, ResponseCapture } from '../../core/pipeline/log-http-request';
import { BodyCollector } from '../../core/pipeline/stream-tap';
import { wrapMethodNoConflict } from '../../core/runtime/wrap';
import type { RequestData } from '../../types/schema';
import { InstrumentationAdapter } from '../common/adapter';
import { bodyToText } from '../common/body';
import { normalizeHeaders } from '../common/headers';

export const UNDICI_LIBRARY_NAME = 'undici';
export const UNDICI_WRAPPER_MARKER = 'outbound-recorder.undici';

export type UndiciRequestUrl = Parameters<typeof undiciRequest>[0];
export type UndiciRequestOptions = NonNullable<Parameters<typeof undiciRequest>[1]>;
export type UndiciResponse = Awaited<ReturnType<typeof undiciRequest>>;
export type UndiciRequestFn = (url: UndiciRequestUrl, options?: UndiciRequestOptions) => Promise<UndiciResponse>;

/** The part of the undici module the adapter patches. */
export interface UndiciModuleLike {
  request: UndiciRequestFn;
}

export function isUndiciModule(value: unknown): value is UndiciModuleLike {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'request') === 'function';
}

export function undiciUrl(url: UndiciRequestUrl): string {
  if (typeof url === 'string') return url;
  if (url instanceof URL) return url.href;
  return format(url);
}

export function undiciRequestData(options: UndiciRequestOptions | undefined): RequestData {
  return {
    headers: normalizeHeaders(options?.headers),
    body: bodyToText(options?.body),
  };
}

type DispatchHandlers = Dispatcher.DispatchHandlers;

/** Forwards every callback to the wrapped handler and copies body chunks into the collector. */
class BodyCaptureHandler implements DispatchHandlers {
  constructor(
    private readonly handler: DispatchHandlers,
    private readonly collector: BodyCollector
  ) {}

  onConnect(...args: Parameters<NonNullable<DispatchHandlers['onConnect']>>): void {
    this.handler.onConnect?.(...args);
  }

  onUpgrade(...args: Parameters<NonNullable<DispatchHandlers['onUpgrade']>>): void {
    this.handler.onUpgrade?.(...args);
  }

  onHeaders(...args: Parameters<NonNullable<DispatchHandlers['onHeaders']>>): boolean {
    return this.handler.onHeaders?.(...args) ?? true;
  }

  onData(...args: Parameters<NonNullable<DispatchHandlers['onData']>>): boolean {
    if (!this.collector.push(args[0])) this.collector.finish();
    return this.handler.onData?.(...args) ?? true;
  }

  onComplete(...args: Parameters<NonNullable<DispatchHandlers['onComplete']>>): void {
    this.collector.finish();
    this.handler.onComplete?.(...args);
  }

  onError(...args: Parameters<NonNullable<DispatchHandlers['onError']>>): void {
    this.collector.finish(args[0]);
    this.handler.onError?.(...args);
  }

  onBodySent(...args: Parameters<NonNullable<DispatchHandlers['onBodySent']>>): void {
    this.handler.onBodySent?.(...args);
  }
}

/** Options for the underlying request with the capture interceptor composed onto its dispatcher. */
export function withBodyCapture(
  options: UndiciRequestOptions | undefined,
  collector: BodyCollector
): UndiciRequestOptions {
  const dispatcher = options?.dispatcher ?? getGlobalDispatcher();
  const capture: Dispatcher.DispatcherComposeInterceptor = (dispatch) => (dispatchOptions, handler) =>
    dispatch(dispatchOptions, new BodyCaptureHandler(handler, collector));
  return { ...options, dispatcher: dispatcher.compose(capture) };
}

export function undiciResponseData(
  response: UndiciResponse,
  collector?: BodyCollector
): ResponseCapture<UndiciResponse> {
  const data: ResponseCapture<UndiciResponse> = {
    statusCode: response.statusCode,
    headers: normalizeHeaders(response.headers),
  };
  if (collector) {
    const body = collector.result();
    data.tapBody = () => ({ response, body });
  }
  return data;
}

export function instrumentUndiciRequest(requestImpl: UndiciRequestFn): UndiciRequestFn {
  return async function recordedRequest(url: UndiciRequestUrl, options?: UndiciRequestOptions): Promise<UndiciResponse> {
    let collector: BodyCollector | undefined;
    return logHttpRequest(
      UNDICI_LIBRARY_NAME,
      undiciUrl(url),
      (options?.method ?? 'GET').toUpperCase(),
      () => undiciRequestData(options),
      (response) => undiciResponseData(response, collector),
      (recording?: RecordingOptions) => {
        if (!recording) return requestImpl(url, options);
        collector = new BodyCollector(recording.maxPayloadSize);
        return requestImpl(url, withBodyCapture(options, collector));
      }
    );
  };
}

export class UndiciAdapter extends InstrumentationAdapter<UndiciModuleLike> {
  readonly libraryName = UNDICI_LIBRARY_NAME;

  /** The live module object, so callers reading undici.request at call time see the wrapper. */
  protected defaultTarget(): UndiciModuleLike | undefined {
    const mod: unknown = require('undici');
    return isUndiciModule(mod) ? mod : undefined;
  }

  protected patch(target: UndiciModuleLike): void {
    wrapMethodNoConflict(target, 'request', UNDICI_WRAPPER_MARKER, (original) => instrumentUndiciRequest(original));
  }
}
