/**
 * Payload codecs. The service encodes envelopes and decodes request bodies
 * through a Codec; JSON is the default, other formats are supplied by the
 * application.
 */

import { MIME } from "@actionkit/core";
import type { PooledBuffer } from "./buffer-pool.js";

export interface Codec {
  /** Content-Type of encoded output */
  readonly contentType: string;
  /** Serializes `value` into `out` */
  encode(value: unknown, out: PooledBuffer): void;
  /** Parses a request body. Throws on malformed input. */
  decode(text: string): unknown;
}

export const jsonCodec: Codec = {
  contentType: MIME.APPLICATION_JSON_CHARSET_UTF8,
  encode(value, out) {
    out.writeString(JSON.stringify(value) ?? "null");
  },
  decode(text) {
    const value: unknown = JSON.parse(text);
    return value;
  },
};
