import { v4 as uuidv4 } from "uuid";
import { ServiceError } from "../errors";
import { ServiceEncoding } from "../http/encoding";
import {
  DispatchResult,
  EarPositions,
  FieldValue,
  Identity,
  MESSAGE_FIELDS,
  MessageField,
  RequestParameters,
  Transport,
  Verifier,
} from "../types";
import { Logger } from "../utils/logger";
import { decodeEarPositions, normalizeResponse, verify } from "./responses";

export type MessageContext = {
  identity: Identity;
  baseUri: string;
  transport: Transport;
  encoding: ServiceEncoding;
  logger: Logger;
};

function isPresent(value: FieldValue | undefined): value is FieldValue {
  if (value === undefined) return false;
  if (typeof value === "number") return true;
  return value.length > 0;
}

/**
 * One batch of pending commands. Each field holds at most one value and each
 * label at most one verifier, so a command issued twice before dispatch keeps
 * only its latest value.
 */
export class Message {
  private context: MessageContext;
  private values: Map<MessageField, FieldValue> = new Map();
  private checks: Map<string, Verifier> = new Map();
  private lastEarPositions: EarPositions | null = null;

  constructor(context: MessageContext) {
    this.context = context;
  }

  /** Undefined or null clears the field. */
  setField(name: MessageField, value: FieldValue | null | undefined): void {
    if (value === undefined || value === null) {
      this.values.delete(name);
    } else {
      this.values.set(name, value);
    }
  }

  getField(name: MessageField): FieldValue | undefined {
    return this.values.get(name);
  }

  registerVerifier(label: string, verifier: Verifier): void {
    this.checks.set(label, verifier);
  }

  /** Labels and verifiers in registration order. */
  get verifiers(): ReadonlyMap<string, Verifier> {
    return new Map(this.checks);
  }

  get earPositions(): EarPositions | null {
    return this.lastEarPositions;
  }

  get isEmpty(): boolean {
    return this.values.size === 0 && this.checks.size === 0;
  }

  buildParameters(): RequestParameters {
    const { serial, token, voice } = this.context.identity;
    const parameters: RequestParameters = new Map<string, FieldValue>([
      ["sn", serial],
      ["token", token],
    ]);
    if (voice) parameters.set("voice", voice);
    for (const field of MESSAGE_FIELDS) {
      const value = this.values.get(field);
      if (isPresent(value)) parameters.set(field, value);
    }
    return parameters;
  }

  async dispatch(): Promise<DispatchResult> {
    const { baseUri, transport, encoding, logger } = this.context;
    const requestId = uuidv4();
    const parameters = this.buildParameters();
    logger.info("Nabaztag request", {
      requestId,
      fields: Array.from(parameters.keys()).filter((key) => key !== "token"),
      verifiers: Array.from(this.checks.keys()),
    });

    const raw = await transport.submitRequest(baseUri, encoding.encodeParameters(parameters));
    const response = normalizeResponse(encoding.decodeInbound(raw));
    logger.debug("Nabaztag response", { requestId, length: response.length });

    if (this.values.has("ears")) {
      this.lastEarPositions = decodeEarPositions(response);
      if (!this.lastEarPositions) {
        logger.debug("Ear positions unreadable", { requestId });
      }
    }

    for (const [label, verifier] of this.checks) {
      if (!verify(verifier, response)) {
        logger.warn("Command not acknowledged", { requestId, label });
        throw new ServiceError(label, response);
      }
    }

    return { ok: true, requestId, response, earPositions: this.lastEarPositions };
  }
}
