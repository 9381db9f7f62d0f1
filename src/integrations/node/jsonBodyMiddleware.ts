/**
 * jsondescent – Node integration / jsonBodyMiddleware
 *
 * A small, framework-agnostic middleware that decodes a raw request body
 * into a value tree.
 *
 * It works with:
 *  - Express (mounted after a raw/text body parser)
 *  - raw Node http.Server
 *  - any "req/res/next" style interface that looks similar
 *
 * On success the decoded tree is attached to the request:
 *
 *    req.jsonBody = { ok: true, value: <JsonValue> }
 *
 * On error the client receives (status 400, or 413 for E_LIMIT):
 *
 *    {
 *      "ok": false,
 *      "error": {
 *        "code": "E_LEX",
 *        "message": "jsondescent: unterminated string."
 *      }
 *    }
 *
 * License: Apache-2.0
 */

import { createDecoder } from '../../core/decoder';
import type { Decoder, DecoderOptions } from '../../core/decoder';
import { createLexError, createParseError, isDecodeError } from '../../core/errors';
import type { DecodeError } from '../../core/errors';
import { toPlain } from '../../core/value';
import type { JsonValue, PlainJson } from '../../core/value';

//////////////////////
// Public interfaces //
//////////////////////

/**
 * The parts of a request the middleware reads. Express and
 * `http.IncomingMessage` (with a `body` added) both fit.
 */
export interface JsonBodyRequest {
  method?: string;
  body?: unknown;
}

/**
 * The parts of a response the middleware writes. Express-style
 * `status().json()` is preferred; otherwise `statusCode`/`setHeader`/`end`.
 */
export interface JsonBodyResponse {
  status?(code: number): unknown;
  json?(body: unknown): unknown;
  statusCode?: number;
  setHeader?(name: string, value: string | number): unknown;
  end?(chunk?: string): unknown;
}

export type NextFunction = (err?: unknown) => void;

/**
 * Attached to the request under `requestPropertyName`.
 */
export type JsonBodyResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: DecodeError };

/**
 * JSON payload sent by the built-in responder.
 */
export interface JsonBodyResponsePayload {
  ok: boolean;
  result?: PlainJson;
  error?: {
    code: string;
    message: string;
    note?: string;
  };
}

export interface JsonBodyMiddlewareOptions<Req extends JsonBodyRequest = JsonBodyRequest> {
  /**
   * Pre-configured decoder. If omitted, one is created from `decoderOptions`.
   */
  decoder?: Decoder;

  decoderOptions?: DecoderOptions;

  /**
   * Methods whose body is decoded. Default: ["POST", "PUT", "PATCH"].
   */
  allowedMethods?: string[];

  /**
   * Where to attach the result on `req`. Default: "jsonBody".
   */
  requestPropertyName?: string;

  /**
   * Called (and awaited) with every decode failure before responding.
   * If it throws, the thrown error goes to `next(err)`, or is rethrown when
   * there is no `next`.
   */
  onError?(err: DecodeError, req: Req): void | Promise<void>;

  /**
   * Attach failures to `req` and call `next()` instead of responding.
   * Default: false.
   */
  delegateResponse?: boolean;

  /**
   * Include `note` in error responses. Default: true.
   */
  exposeErrorDetails?: boolean;

  /**
   * Static headers set on every response the middleware sends.
   */
  corsHeaders?: {
    [headerName: string]: string;
  };
}

//////////////////////
// Middleware factory
//////////////////////

/**
 * Create a body-decoding middleware.
 *
 *  - Express:
 *      app.post('/ingest', express.text({ type: '*\/*' }), createJsonBodyMiddleware(), handler);
 *
 *  - Node http.Server:
 *      const decodeBody = createJsonBodyMiddleware();
 *      http.createServer((req, res) => {
 *        const chunks: Buffer[] = [];
 *        req.on('data', (c) => chunks.push(c));
 *        req.on('end', () => {
 *          void decodeBody(Object.assign(req, { body: Buffer.concat(chunks) }), res);
 *        });
 *      });
 */
export function createJsonBodyMiddleware<Req extends JsonBodyRequest = JsonBodyRequest>(
  options: JsonBodyMiddlewareOptions<Req> = {},
): (req: Req, res: JsonBodyResponse, next?: NextFunction) => Promise<void> {
  const {
    decoder = createDecoder(options.decoderOptions),
    allowedMethods = ['POST', 'PUT', 'PATCH'],
    requestPropertyName = 'jsonBody',
    onError,
    delegateResponse = false,
    exposeErrorDetails = true,
    corsHeaders,
  } = options;

  const methods = allowedMethods.map((m) => m.toUpperCase());

  return async function jsonBodyMiddleware(
    req: Req,
    res: JsonBodyResponse,
    next?: NextFunction,
  ): Promise<void> {
    const method = String(req.method || 'GET').toUpperCase();
    if (methods.length > 0 && !methods.includes(method)) {
      if (typeof next === 'function') {
        return next();
      }
      if (corsHeaders) setCorsHeaders(res, corsHeaders);
      sendJson(res, 405, {
        ok: false,
        error: {
          code: 'E_METHOD',
          message: 'Method Not Allowed',
        },
      });
      return;
    }

    let result: JsonBodyResult;
    try {
      const source = readBody(req.body);
      result = decoder.tryDecode(source);
    } catch (err) {
      if (!isDecodeError(err)) {
        if (typeof next === 'function') return next(err);
        throw err;
      }
      result = { ok: false, error: err };
    }

    if (result.ok) {
      attachToRequest(req, requestPropertyName, result);
      if (typeof next === 'function') return next();
      if (corsHeaders) setCorsHeaders(res, corsHeaders);
      sendJson(res, 200, { ok: true, result: toPlain(result.value) });
      return;
    }

    if (onError) {
      try {
        await onError(result.error, req);
      } catch (hookErr) {
        if (typeof next === 'function') return next(hookErr);
        throw hookErr;
      }
    }

    if (delegateResponse) {
      attachToRequest(req, requestPropertyName, result);
      if (typeof next === 'function') return next();
    }

    if (corsHeaders) setCorsHeaders(res, corsHeaders);
    sendJson(
      res,
      result.error.code === 'E_LIMIT' ? 413 : 400,
      buildErrorResponse(result.error, exposeErrorDetails),
    );
  };
}

/**
 * Narrow whatever sits under `requestPropertyName` back to a result.
 */
export function isJsonBodyResult(value: unknown): value is JsonBodyResult {
  if (typeof value !== 'object' || value === null) return false;
  const ok: unknown = Reflect.get(value, 'ok');
  if (ok === true) return typeof Reflect.get(value, 'value') === 'object';
  if (ok === false) return isDecodeError(Reflect.get(value, 'error'));
  return false;
}

//////////////////////
// Helper functions //
//////////////////////

function readBody(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body instanceof Uint8Array) return decodeUtf8(body);

  throw createParseError({
    message: 'jsondescent: request body must be text or bytes.',
    note: 'Mount a raw or text body parser before this middleware.',
  });
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw createLexError({
      message: 'jsondescent: request body is not valid UTF-8.',
      cause: err,
    });
  }
}

function attachToRequest(req: object, key: string, value: JsonBodyResult): void {
  Reflect.set(req, key, value);
}

function buildErrorResponse(
  err: DecodeError,
  exposeDetails: boolean,
): JsonBodyResponsePayload {
  const error: NonNullable<JsonBodyResponsePayload['error']> = {
    code: err.code,
    message: err.message,
  };

  if (exposeDetails && err.note) {
    error.note = err.note;
  }

  return { ok: false, error };
}

/**
 * Minimal JSON sender that works with both Express-like and raw Node responses.
 */
function sendJson(res: JsonBodyResponse, statusCode: number, body: JsonBodyResponsePayload): void {
  if (typeof res.status === 'function' && typeof res.json === 'function') {
    res.status(statusCode);
    res.json(body);
    return;
  }

  const payload = JSON.stringify(body);

  res.statusCode = statusCode;
  if (typeof res.setHeader === 'function') {
    res.setHeader('Content-Type', 'application/json; charset=utf-8');
    res.setHeader('Content-Length', Buffer.byteLength(payload, 'utf8'));
  }

  if (typeof res.end === 'function') {
    res.end(payload);
  }
}

function setCorsHeaders(res: JsonBodyResponse, headers: { [headerName: string]: string }): void {
  if (typeof res.setHeader !== 'function') return;
  for (const [key, value] of Object.entries(headers)) {
    res.setHeader(key, value);
  }
}
