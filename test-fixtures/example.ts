// Example services shared by the tests.

import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import type { Type } from "protobufjs";
import { defineService, protobufMessageType, rpc } from "@twine/core";

export const root = new protobuf.Root().loadSync(fileURLToPath(new URL("./protos/example.proto", import.meta.url)), {
  keepCase: true,
});

export interface Size {
  inches: number;
}

export interface Hat {
  inches: number;
  color: string;
}

export type Empty = Record<string, never>;

export interface Order {
  id: string;
  style: "STYLE_UNSPECIFIED" | "FEDORA" | "BOWLER";
  tags: string[];
  size: Size | null;
}

export const SizeProto = root.lookupType("example.Size");
export const HatProto = root.lookupType("example.Hat");
export const EmptyProto = root.lookupType("example.Empty");
export const OrderProto = root.lookupType("example.Order");

export const SizeType = protobufMessageType<Size>(SizeProto);
export const HatType = protobufMessageType<Hat>(HatProto);
export const EmptyType = protobufMessageType<Empty>(EmptyProto);
export const OrderType = protobufMessageType<Order>(OrderProto);

export const Haberdasher = defineService({
  packageName: "example",
  serviceName: "Haberdasher",
  rpcs: {
    MakeHat: rpc(SizeType, HatType),
  },
});

export const EmptyService = defineService({
  serviceName: "EmptyService",
  rpcs: {},
});

export class HaberdasherHandler {
  makeHat(size: Size): Hat {
    return { inches: size.inches, color: "white" };
  }
}

/** Encode a message with protobufjs directly, as a client would. */
export function encodeProto(type: Type, value: Record<string, unknown>): Uint8Array {
  return type.encode(type.create(value)).finish();
}

/** Decode a protobuf body to a plain object, as a client would. */
export function decodeProto(type: Type, bytes: Uint8Array): Record<string, unknown> {
  return type.toObject(type.decode(bytes));
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function jsonBody(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function parseJsonBody(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes));
}
