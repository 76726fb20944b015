import { describe, it, expect, beforeEach } from "vitest";
import { Buffer } from "node:buffer";
import { Message } from "../../src/message/message";
import { ServiceEncoding } from "../../src/http/encoding";
import { ServiceError, TransportError } from "../../src/errors";
import type { Identity, Transport } from "../../src/types";
import { createLogger } from "../../src/utils/logger";

/**
 * Transport that replies with a canned body and remembers what it was sent.
 */
class FakeTransport implements Transport {
  calls: Array<{ baseUri: string; parameters: Map<string, string> }> = [];
  reply = "";
  error: Error | null = null;

  async submitRequest(baseUri: string, parameters: ReadonlyMap<string, string>): Promise<Uint8Array> {
    this.calls.push({ baseUri, parameters: new Map(parameters) });
    if (this.error) throw this.error;
    return Buffer.from(this.reply, "latin1");
  }
}

const BASE_URI = "http://rabbit.test/api.jsp?";

describe("Message", () => {
  let transport: FakeTransport;
  let message: Message;

  const create = (identity: Identity = { serial: "0013d3000000", token: "test-token" }) =>
    new Message({
      identity,
      baseUri: BASE_URI,
      transport,
      encoding: new ServiceEncoding(),
      logger: createLogger("silent"),
    });

  beforeEach(() => {
    transport = new FakeTransport();
    message = create();
  });

  describe("buildParameters", () => {
    it("starts with the identity and lists fields in wire order", () => {
      message.setField("tts", "hello");
      message.setField("posleft", 4);
      message.setField("chor", "10");
      message.setField("posright", 8);
      expect(Array.from(message.buildParameters().keys())).toEqual([
        "sn",
        "token",
        "posright",
        "posleft",
        "tts",
        "chor",
      ]);
    });

    it("includes the voice after the token when set", () => {
      message = create({ serial: "0013d3000000", token: "test-token", voice: "heather22k" });
      expect(Array.from(message.buildParameters())).toEqual([
        ["sn", "0013d3000000"],
        ["token", "test-token"],
        ["voice", "heather22k"],
      ]);
    });

    it("keeps the last value set for a field", () => {
      message.setField("tts", "first");
      message.setField("tts", "second");
      expect(message.buildParameters().get("tts")).toBe("second");
    });

    it("omits cleared and empty fields", () => {
      message.setField("chortitle", "wave");
      message.setField("chortitle", undefined);
      message.setField("tts", "");
      message.setField("posleft", 0);
      const parameters = message.buildParameters();
      expect(parameters.has("chortitle")).toBe(false);
      expect(parameters.has("tts")).toBe(false);
      expect(parameters.get("posleft")).toBe(0);
    });
  });

  describe("dispatch", () => {
    it("sends escaped ISO-8859-1 values in one request", async () => {
      message.setField("tts", "bonjour été");
      message.setField("posleft", 4);
      transport.reply = "Votre texte a bien été transmis";
      await message.dispatch();

      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0].baseUri).toBe(BASE_URI);
      expect(Array.from(transport.calls[0].parameters)).toEqual([
        ["sn", "0013d3000000"],
        ["token", "test-token"],
        ["posleft", "4"],
        ["tts", "bonjour+%E9t%E9"],
      ]);
    });

    it("returns the normalized response on success", async () => {
      message.setField("tts", "hi");
      message.registerVerifier("Speech", "say");
      transport.reply = "Your text was forwarded     Message sent   ";
      const result = await message.dispatch();
      expect(result.ok).toBe(true);
      expect(result.response).toBe("Your text was forwarded\nMessage sent");
      expect(result.earPositions).toBeNull();
    });

    it("reports the first failing verifier in registration order", async () => {
      message.registerVerifier("Speech", "say");
      message.registerVerifier("Left ear", "leftEar");
      message.registerVerifier("Right ear", "rightEar");
      transport.reply = "Your text was forwarded  Your right change of ears was transmitted";
      await expect(message.dispatch()).rejects.toMatchObject({
        name: "ServiceError",
        label: "Left ear",
        response: "Your text was forwarded\nYour right change of ears was transmitted",
      });
    });

    it("replaces a verifier registered twice under one label", async () => {
      message.registerVerifier("Speech", /never/);
      message.registerVerifier("Speech", "say");
      expect(Array.from(message.verifiers)).toEqual([["Speech", "say"]]);
      transport.reply = "Your text was forwarded";
      await expect(message.dispatch()).resolves.toMatchObject({ ok: true });
    });

    it("hands out a copy of its verifiers", () => {
      message.registerVerifier("Speech", "say");
      const verifiers = message.verifiers;
      message.registerVerifier("Left ear", "leftEar");
      expect(Array.from(verifiers.keys())).toEqual(["Speech"]);
      expect(Array.from(message.verifiers.keys())).toEqual(["Speech", "Left ear"]);
    });

    it("fails with ServiceError when nothing matches", async () => {
      message.registerVerifier("Speech", "say");
      transport.reply = "Erreur";
      const error = await message.dispatch().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toHaveProperty("message", "Speech: Erreur");
    });

    it("passes transport failures through", async () => {
      transport.error = new TransportError({ url: BASE_URI, message: "HTTP 502 Bad Gateway", status: 502 });
      await expect(message.dispatch()).rejects.toBeInstanceOf(TransportError);
    });

    it("reads ear positions when the ears were queried", async () => {
      message.setField("ears", "ok");
      transport.reply = "Position gauche = 3    Position droite = 12";
      const result = await message.dispatch();
      expect(result.earPositions).toEqual({ left: 3, right: 12 });
      expect(message.earPositions).toEqual({ left: 3, right: 12 });
    });

    it("ignores ear positions that were not asked for", async () => {
      transport.reply = "Left position = 3  Right position = 12";
      const result = await message.dispatch();
      expect(result.earPositions).toBeNull();
    });

    it("leaves ear positions empty when unreadable", async () => {
      message.setField("ears", "ok");
      transport.reply = "Left position = 3";
      const result = await message.dispatch();
      expect(result.earPositions).toBeNull();
    });
  });
});
