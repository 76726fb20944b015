import { describe, it, expect } from "vitest";
import { decodeEarPositions, normalizeResponse, verify } from "../../src/message/responses";

describe("normalizeResponse", () => {
  it("turns wide gaps into line breaks", () => {
    expect(normalizeResponse("a  b\t\t c   ")).toBe("a\nb\nc");
  });

  it("leaves single spaces alone", () => {
    expect(normalizeResponse("Your text was forwarded")).toBe("Your text was forwarded");
  });
});

describe("decodeEarPositions", () => {
  it("reads English positions", () => {
    expect(decodeEarPositions("Left position = 7\nRight position = -2")).toEqual({
      left: 7,
      right: -2,
    });
  });

  it("reads French positions", () => {
    expect(decodeEarPositions("Position gauche = 0\nPosition droite = 16")).toEqual({
      left: 0,
      right: 16,
    });
  });

  it("returns null when one side is missing", () => {
    expect(decodeEarPositions("Left position = 7")).toBeNull();
  });
});

describe("verify", () => {
  it("accepts both languages for speech", () => {
    expect(verify("say", "Votre texte a bien été transmis")).toBe(true);
    expect(verify("say", "Your text was forwarded")).toBe(true);
  });

  it("rejects an unrelated response", () => {
    expect(verify("say", "Your choreography was forwarded")).toBe(false);
  });

  it("matches ear acknowledgements per side", () => {
    const response = "Your left change of ears was transmitted";
    expect(verify("leftEar", response)).toBe(true);
    expect(verify("rightEar", response)).toBe(false);
  });

  it("accepts an explicit pattern", () => {
    expect(verify(/nabcast/, "Your nabcast was posted")).toBe(true);
  });
});
