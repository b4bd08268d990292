/**
 * Typebox schemas for the `tailscale status --json` document.
 *
 * Only the fields the exporter reads are described; everything else in the
 * document is ignored. The client writes empty lists and maps as `null`, so lists
 * and the peer map accept it. Integers arrive as `bigint` (see decode.ts), so
 * 64-bit user ids survive intact.
 */

import { Type, type Static } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";

const ByteCount = Type.Union([Type.BigInt({ minimum: 0n }), Type.Number({ minimum: 0 })]);

export const RawNode = Type.Object({
  ID: Type.String(),
  HostName: Type.String(),
  DNSName: Type.String(),
  TailscaleIPs: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
  RxBytes: Type.Optional(ByteCount),
  TxBytes: Type.Optional(ByteCount),
  UserID: Type.Optional(Type.BigInt()),
});

export type RawNode = Static<typeof RawNode>;

export const RawStatus = Type.Object({
  Self: RawNode,
  Peer: Type.Optional(Type.Union([Type.Record(Type.String(), RawNode), Type.Null()])),
});

export type RawStatus = Static<typeof RawStatus>;

export const RawStatusChecker = TypeCompiler.Compile(RawStatus);
