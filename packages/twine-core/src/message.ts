// Typed message descriptors.
//
// A MessageType knows how to move one message type between its in-memory
// form (a plain object handed to handlers) and the two Twirp wire formats.

import type { IConversionOptions, Message, Type } from "protobufjs";
import { checkMessage, isPlainObject } from "./field_check.ts";

/**
 * Describes one message type at runtime.
 *
 * Used by the codecs to decode requests and encode responses without any
 * serialization logic in service code.
 */
export interface MessageType<T> {
  /** Fully qualified message name, e.g. "example.Hat". */
  readonly typeName: string;
  /** Encode a message to its binary protobuf form. */
  encodeBinary(message: T): Uint8Array;
  /** Decode binary protobuf bytes. Throws MessageDecodeError. */
  decodeBinary(bytes: Uint8Array): T;
  /** Encode a message to its JSON text form. */
  encodeJson(message: T): string;
  /** Decode JSON text. Throws MessageDecodeError. */
  decodeJson(text: string): T;
  /** Return null when the value can be encoded as this type, a reason otherwise. */
  verify(value: unknown): string | null;
  /**
   * Convert a value accepted by verify() to the form handlers receive, with
   * every field present.
   */
  normalize(value: T): T;
}

/** A message could not be read as the expected type. */
export class MessageDecodeError extends Error {
  constructor(
    public readonly typeName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MessageDecodeError";
  }
}

export interface ProtobufMessageOptions {
  /**
   * Include fields that hold their default value in JSON output.
   * Defaults to false (proto3 JSON omits them).
   */
  emitDefaults?: boolean;
}

// Objects handed to handlers: every field present, 64-bit integers as
// strings so no precision is lost, enums by name.
const HANDLER_CONVERSION: IConversionOptions = {
  longs: String,
  enums: String,
  defaults: true,
  arrays: true,
  objects: true,
};

/**
 * Create a MessageType from a protobufjs reflection type.
 *
 * @example
 * ```typescript
 * const root = new protobuf.Root().loadSync("haberdasher.proto", { keepCase: true });
 * const HatType = protobufMessageType<Hat>(root.lookupType("example.Hat"));
 * ```
 */
export function protobufMessageType<T extends object>(
  type: Type,
  options: ProtobufMessageOptions = {},
): MessageType<T> {
  type.resolveAll();
  const typeName = type.fullName.replace(/^\./, "");
  const jsonConversion: IConversionOptions = {
    longs: String,
    enums: String,
    bytes: String,
    json: true,
    defaults: options.emitDefaults ?? false,
  };

  const toMessage = (value: object): Message => type.fromObject(toPlainObject(value));

  // protobufjs hands back untyped objects; T is what the schema describes.
  const toHandlerObject = (message: Message): T => {
    const value: unknown = type.toObject(message, HANDLER_CONVERSION);
    return value as T;
  };

  return {
    typeName,

    encodeBinary(message: T): Uint8Array {
      return type.encode(toMessage(message)).finish();
    },

    decodeBinary(bytes: Uint8Array): T {
      let message: Message;
      try {
        message = type.decode(bytes);
      } catch (e) {
        throw new MessageDecodeError(typeName, errorMessage(e), { cause: e });
      }
      return toHandlerObject(message);
    },

    encodeJson(message: T): string {
      return JSON.stringify(type.toObject(toMessage(message), jsonConversion));
    },

    decodeJson(text: string): T {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (e) {
        throw new MessageDecodeError(typeName, errorMessage(e), { cause: e });
      }
      if (!isPlainObject(parsed)) {
        throw new MessageDecodeError(typeName, `expected a JSON object for ${typeName}`);
      }
      const problem = checkMessage(type, parsed, typeName);
      if (problem !== null) {
        throw new MessageDecodeError(typeName, problem);
      }

      let message: Message;
      try {
        message = type.fromObject(parsed);
      } catch (e) {
        throw new MessageDecodeError(typeName, errorMessage(e), { cause: e });
      }
      return toHandlerObject(message);
    },

    verify(value: unknown): string | null {
      if (!isPlainObject(value)) {
        return `${typeName}: object expected`;
      }
      const problem = checkMessage(type, value, typeName);
      if (problem !== null) {
        return problem;
      }
      try {
        type.fromObject(value);
      } catch (e) {
        return errorMessage(e);
      }
      return null;
    },

    normalize(value: T): T {
      return toHandlerObject(toMessage(value));
    },
  };
}

function toPlainObject(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
