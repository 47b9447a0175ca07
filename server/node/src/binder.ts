/**
 * Binders turn raw request data into a typed payload.
 *
 * The target of a bind is a zod schema: its keys name the query parameters
 * or body fields to read, and parsing it yields the typed value. A binder
 * fails with the schema's (or codec's) own error; the context decides how
 * that error is reported.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { ZodTypeAny, z } from "zod";
import { jsonCodec, type Codec } from "./codec.js";

/**
 * The part of node:http's IncomingMessage the binders rely on.
 */
export interface RequestSource extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

export type QueryValues = Record<string, string | string[]>;

export interface Binder {
  bind<S extends ZodTypeAny>(schema: S, req: RequestSource): Promise<z.output<S>>;
}

/** Converts a function to a Binder. */
export function binderFunc(
  fn: (schema: ZodTypeAny, req: RequestSource) => Promise<unknown>
): Binder {
  return {
    async bind(schema, req) {
      const raw = await fn(schema, req);
      return schema.parseAsync(raw);
    },
  };
}

// ── Query ───────────────────────────────────────────────────────────

/**
 * Parses the query string of a request URL. A key seen once maps to a
 * string, a repeated key to the list of its values. The result has no
 * prototype, so keys such as "constructor" or "__proto__" are plain entries.
 */
export function parseQuery(url: string | undefined): QueryValues {
  const values: QueryValues = Object.create(null);
  const start = url ? url.indexOf("?") : -1;
  if (!url || start < 0) return values;
  const hash = url.indexOf("#", start);
  const qs = url.slice(start + 1, hash < 0 ? undefined : hash);
  for (const [k, v] of new URLSearchParams(qs)) {
    const prev = Object.hasOwn(values, k) ? values[k] : undefined;
    if (prev === undefined) values[k] = v;
    else if (Array.isArray(prev)) prev.push(v);
    else values[k] = [prev, v];
  }
  return values;
}

/** First value of `key`, or "" when absent. */
export function firstQueryValue(values: QueryValues, key: string): string {
  if (!Object.hasOwn(values, key)) return "";
  const v = values[key];
  if (v === undefined) return "";
  return Array.isArray(v) ? (v[0] ?? "") : v;
}

/** Binds already parsed query values to `schema`. */
export function bindQueryValues<S extends ZodTypeAny>(schema: S, values: QueryValues): Promise<z.output<S>> {
  return schema.parseAsync(values);
}

/** Binds the request's query string. */
export function queryBinder(): Binder {
  return {
    bind(schema, req) {
      return bindQueryValues(schema, parseQuery(req.url));
    },
  };
}

// ── Body ────────────────────────────────────────────────────────────

/** Content-Length of the request, or -1 when unknown. */
export function contentLength(req: Pick<RequestSource, "headers">): number {
  const raw = req.headers["content-length"];
  if (raw === undefined || raw === "") return -1;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : -1;
}

/** Reads the whole request body as UTF-8, failing beyond `maxBytes`. */
export async function readBody(req: RequestSource, maxBytes: number): Promise<string> {
  if (contentLength(req) > maxBytes) {
    throw new Error(`request body too large (limit ${maxBytes} bytes)`);
  }
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    received += buf.length;
    if (received > maxBytes) {
      throw new Error(`request body too large (limit ${maxBytes} bytes)`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks, received).toString("utf8");
}

/**
 * Binds the request body decoded with `codec`.
 * When Content-Length is 0 or unknown the body is not read and the schema
 * is applied to an empty object.
 */
export function bodyBinder(params?: { codec?: Codec; maxBodyBytes?: number }): Binder {
  const codec = params?.codec ?? jsonCodec;
  const maxBodyBytes = params?.maxBodyBytes ?? 1_048_576;
  return {
    async bind(schema, req) {
      let raw: unknown = {};
      if (contentLength(req) > 0) {
        const text = await readBody(req, maxBodyBytes);
        if (text !== "") raw = codec.decode(text);
      }
      return schema.parseAsync(raw);
    },
  };
}

/** Body binder using the JSON codec. */
export function jsonBinder(params?: { maxBodyBytes?: number }): Binder {
  return bodyBinder({ codec: jsonCodec, maxBodyBytes: params?.maxBodyBytes });
}
