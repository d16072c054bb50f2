// Content types accepted by Twirp services.

export const ContentType = {
  Json: "application/json",
  Protobuf: "application/protobuf",
} as const;

export type ContentType = (typeof ContentType)[keyof typeof ContentType];

/**
 * Narrow a Content-Type header value to one of the Twirp content types.
 *
 * Matching is exact: parameters such as "; charset=utf-8" are not accepted.
 */
export function parseContentType(value: string | undefined): ContentType | undefined {
  switch (value) {
    case ContentType.Json:
      return ContentType.Json;
    case ContentType.Protobuf:
      return ContentType.Protobuf;
    default:
      return undefined;
  }
}
