// Request/response contract with the surrounding HTTP layer.

/** An inbound HTTP request, as far as a Twirp service needs to see it. */
export interface TwirpRequest {
  /** HTTP method, e.g. "POST". */
  method: string;
  /** Request path without query string, e.g. "/twirp/example.Haberdasher/MakeHat". */
  path: string;
  /**
   * Path to route on when the service is mounted below the root, e.g.
   * "/twirp/example.Haberdasher/MakeHat" for "/api/twirp/example.Haberdasher/MakeHat".
   * Defaults to `path`, which is still the path reported in errors.
   */
  routePath?: string;
  /** Value of the Content-Type header, if any. */
  contentType?: string;
  /** Request body; a stream is only read once routing has succeeded. */
  body: Uint8Array | AsyncIterable<Uint8Array>;
}

/** An outbound HTTP response with exactly one body chunk. */
export interface TwirpResponse {
  status: number;
  headers: { "Content-Type": string };
  body: [Uint8Array];
}

/** Read a request body into a single buffer. */
export async function readBody(body: Uint8Array | AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  if (body instanceof Uint8Array) {
    return body;
  }

  const chunks: Uint8Array[] = [];
  let length = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    length += chunk.length;
  }

  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
