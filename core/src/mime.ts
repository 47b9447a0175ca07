/**
 * MIME types used by the response helpers.
 */

export const CHARSET_UTF8 = "charset=UTF-8";

export const MIME = {
  APPLICATION_JSON: "application/json",
  APPLICATION_JSON_CHARSET_UTF8: `application/json; ${CHARSET_UTF8}`,
  APPLICATION_XML: "application/xml",
  APPLICATION_XML_CHARSET_UTF8: `application/xml; ${CHARSET_UTF8}`,
  APPLICATION_FORM: "application/x-www-form-urlencoded",
  MULTIPART_FORM: "multipart/form-data",
  TEXT_PLAIN: "text/plain",
} as const;

export type KnownMime = (typeof MIME)[keyof typeof MIME];

// Header values for the fixed set are built once and shared by every response.
const PRESET_HEADER_VALUES: ReadonlyMap<string, KnownMime> = new Map(
  Object.values(MIME).map((ct): [string, KnownMime] => [ct, ct])
);

/**
 * Returns the Content-Type header value for `ct`.
 * Known types come from the preset table; anything else passes through.
 * Returns undefined for "" (meaning: leave the header alone).
 */
export function contentTypeHeader(ct: string): string | undefined {
  if (ct === "") return undefined;
  return PRESET_HEADER_VALUES.get(ct) ?? ct;
}
