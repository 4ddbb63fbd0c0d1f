import type { KintoRequestError } from '../error/errorToString.js';
import { errorDetailSchema, KintoError } from '../error/kintoError.js';
import { NetworkError } from '../error/networkError.js';
import { ServerError } from '../error/serverError.js';
import type { FetchResponse } from '../types/request.js';
import { readResponseBody } from '../utils/readResponseBody.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { Client, Decoder, Pager, ResponseInterpreter } from './types.js';

/** Response header holding the URL of the next page. */
export const NEXT_PAGE_HEADER = 'next-page';
/** Response header holding the total number of objects of a list. */
export const TOTAL_RECORDS_HEADER = 'total-records';

/** A successful response with its body already read. */
interface ReadResponse {
  response: FetchResponse;
  body: string;
}

/**
 * Diagnostic for a body that could not be read as the expected shape.
 * Includes the raw body, since that is usually what explains the failure.
 */
function diagnostic(error: Error, body: string): string {
  return `${error.message}; body: ${body}`;
}

/**
 * Parses and decodes a body, classifying any failure as a {@link ServerError}.
 */
async function decodeBody<T>(response: FetchResponse, body: string, decoder: Decoder<T>): SafeWrapAsync<ServerError, T> {
  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(body));
  if (errJson) {
    return [
      new ServerError(response.status, response.statusText, diagnostic(new Error(`error parsing json: ${errJson.message}`), body), {
        cause: errJson,
      }),
      null,
    ];
  }

  const [errDecode, value] = await decoder(json);
  if (errDecode) {
    return [
      new ServerError(response.status, response.statusText, diagnostic(toMessage(errDecode), body), { cause: errDecode }),
      null,
    ];
  }

  return [null, value];
}

/**
 * Flattens an error and its causes into one message, e.g.
 * `error decoding data: error validating data; issues: id: expected string`.
 */
function toMessage(error: Error): Error {
  const messages: string[] = [];
  let current: unknown = error;
  while (current instanceof Error && messages.length < 10) {
    messages.push(current.message);
    current = current.cause;
  }

  return new Error(messages.join(': '));
}

/**
 * Classifies a non-2xx response: a documented Kinto error body becomes a
 * {@link KintoError}, anything else a {@link ServerError}.
 */
async function classifyFailure(response: FetchResponse, body: string): Promise<KintoError | ServerError> {
  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(body));
  if (errJson) {
    return new ServerError(
      response.status,
      response.statusText,
      diagnostic(new Error(`error parsing error body: ${errJson.message}`), body),
      { cause: errJson },
    );
  }

  const [errDetail, detail] = await validator(json, errorDetailSchema);
  if (errDetail) {
    return new ServerError(response.status, response.statusText, diagnostic(errDetail, body), { cause: errDetail });
  }

  return new KintoError(response.status, response.statusText, detail);
}

/**
 * Shared first step of both interpreters: transport failures and unreadable bodies
 * become {@link NetworkError}, non-2xx statuses are classified, and 2xx responses
 * are returned with their body for decoding.
 */
async function readOutcome(outcome: SafeWrap<Error, FetchResponse>): SafeWrapAsync<KintoRequestError, ReadResponse> {
  const [errTransport, response] = outcome;
  if (errTransport) {
    return [new NetworkError('error sending request', { cause: errTransport }), null];
  }

  const [errBody, body] = await readResponseBody(response);
  if (errBody) {
    return [new NetworkError('error receiving response', { cause: errBody, response }), null];
  }

  if (!response.ok) {
    return [await classifyFailure(response, body), null];
  }

  return [null, { response, body }];
}

/**
 * Reads the `total-records` header as a signed decimal integer, `0` when missing
 * or not numeric. The server's number is kept as sent, negative values included.
 */
export function parseTotal(value: string | null): number {
  const trimmed = value?.trim() ?? '';
  if (!/^-?\d+$/.test(trimmed)) {
    return 0;
  }

  // `-0` reads as 0
  return Number.parseInt(trimmed, 10) || 0;
}

/**
 * Interpreter for single-object endpoints: decodes the body with `decoder`.
 */
export function expectJson<T>(decoder: Decoder<T>): ResponseInterpreter<T> {
  return async (outcome) => {
    const [errOutcome, read] = await readOutcome(outcome);
    if (errOutcome) {
      return [errOutcome, null];
    }

    return decodeBody(read.response, read.body, decoder);
  };
}

/**
 * Interpreter for list endpoints: decodes one page into a fresh {@link Pager}
 * carrying the pagination headers, `client` and `decoder`.
 */
export function expectPager<T>(client: Client, decoder: Decoder<T[]>): ResponseInterpreter<Pager<T>> {
  return async (outcome) => {
    const [errOutcome, read] = await readOutcome(outcome);
    if (errOutcome) {
      return [errOutcome, null];
    }

    const [errDecode, objects] = await decodeBody(read.response, read.body, decoder);
    if (errDecode) {
      return [errDecode, null];
    }

    return [
      null,
      {
        client,
        objects,
        decoder,
        total: parseTotal(read.response.headers.get(TOTAL_RECORDS_HEADER)),
        nextPage: read.response.headers.get(NEXT_PAGE_HEADER),
      },
    ];
  };
}
