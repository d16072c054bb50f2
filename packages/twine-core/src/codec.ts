// Codecs for the two Twirp content types.
//
// A codec selects the wire form of a MessageType from the negotiated
// Content-Type. Errors are never encoded here: they are always JSON.

import { ContentType, parseContentType } from "@twine/wire";
import { MessageDecodeError, type MessageType } from "./message.ts";

export interface Codec {
  /** The Content-Type this codec reads and writes. */
  readonly contentType: ContentType;
  encode<T>(type: MessageType<T>, message: T): Uint8Array;
  /** Decode a request body. Throws MessageDecodeError. */
  decode<T>(type: MessageType<T>, bytes: Uint8Array): T;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export const jsonCodec: Codec = {
  contentType: ContentType.Json,
  encode(type, message) {
    return encoder.encode(type.encodeJson(message));
  },
  decode(type, bytes) {
    let text: string;
    try {
      text = decoder.decode(bytes);
    } catch (e) {
      throw new MessageDecodeError(type.typeName, "body is not valid UTF-8", { cause: e });
    }
    return type.decodeJson(text);
  },
};

export const protobufCodec: Codec = {
  contentType: ContentType.Protobuf,
  encode(type, message) {
    return type.encodeBinary(message);
  },
  decode(type, bytes) {
    return type.decodeBinary(bytes);
  },
};

const codecs = new Map<ContentType, Codec>([
  [ContentType.Json, jsonCodec],
  [ContentType.Protobuf, protobufCodec],
]);

/** Find the codec for a Content-Type header value, matched exactly. */
export function codecForContentType(value: string | undefined): Codec | undefined {
  const contentType = parseContentType(value);
  return contentType === undefined ? undefined : codecs.get(contentType);
}
