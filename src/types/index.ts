import type { Buffer } from "node:buffer";

/** Device identity: fixed for the lifetime of a client. */
export type Identity = {
  readonly serial: string;
  readonly token: string;
  readonly voice?: string;
};

/** Every command field the API accepts, in the order they go on the wire. */
export const MESSAGE_FIELDS = [
  "idmessage",
  "posright",
  "posleft",
  "idapp",
  "tts",
  "chor",
  "chortitle",
  "nabcast",
  "ears",
] as const;

export type MessageField = (typeof MESSAGE_FIELDS)[number];

/** Text may be given as bytes in the caller's charset. */
export type FieldValue = string | number | Buffer;

/** Ordered parameter set, keys in wire order. */
export type RequestParameters = Map<string, FieldValue>;

/** Commands with a known acknowledgement sentence. */
export type CommandKind = "say" | "leftEar" | "rightEar" | "choreography";

/**
 * A check run against the normalized response: either a known command's
 * acknowledgement or an explicit pattern.
 */
export type Verifier = CommandKind | RegExp;

export type EarPositions = {
  left: number;
  right: number;
};

export type DispatchResult = {
  ok: true;
  requestId: string;
  /** Normalized response text. */
  response: string;
  /** Only set when the batch queried the ears and both positions were readable. */
  earPositions: EarPositions | null;
};

export interface Transport {
  /** Parameter values arrive already transcoded and escaped. */
  submitRequest(baseUri: string, parameters: ReadonlyMap<string, string>): Promise<Uint8Array>;
}
