import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import { ServiceEncoding } from "../../src/http/encoding";

describe("ServiceEncoding", () => {
  const encoding = new ServiceEncoding();

  it("escapes form-style over ISO-8859-1 bytes", () => {
    expect(encoding.escape("Ça va ?")).toBe("%C7a+va+%3F");
  });

  it("keeps unreserved characters", () => {
    expect(encoding.escape("a~b.c-d_e*")).toBe("a~b.c-d_e%2A");
  });

  it("replaces characters the service charset cannot hold", () => {
    expect(Array.from(encoding.encodeOutbound("日本"))).toEqual([0x3f, 0x3f]);
  });

  it("decodes byte input with the caller charset", () => {
    const utf16 = new ServiceEncoding({ callerCharset: "utf16le" });
    expect(Array.from(utf16.encodeOutbound(Buffer.from("été", "utf16le")))).toEqual([
      0xe9, 0x74, 0xe9,
    ]);
  });

  it("decodes responses from ISO-8859-1", () => {
    expect(encoding.decodeInbound(Buffer.from([0x56, 0x6f, 0x74, 0x72, 0x65, 0x20, 0xe9]))).toBe(
      "Votre é"
    );
  });

  it("escapes every parameter and keeps their order", () => {
    const encoded = encoding.encodeParameters(
      new Map<string, string | number>([
        ["sn", "0013d3000000"],
        ["posleft", 4],
        ["chor", "10,0,1,4,255,0,0"],
      ])
    );
    expect(Array.from(encoded)).toEqual([
      ["sn", "0013d3000000"],
      ["posleft", "4"],
      ["chor", "10%2C0%2C1%2C4%2C255%2C0%2C0"],
    ]);
  });
});
