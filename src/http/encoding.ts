import { Buffer } from "node:buffer";

export const SERVICE_CHARSET = "latin1" as const;

const CALLER_CHARSETS = ["utf8", "utf-8", "utf16le", "latin1", "binary", "ascii"] as const;

export type CallerCharset = (typeof CALLER_CHARSETS)[number];

export function isCallerCharset(value: string): value is CallerCharset {
  return (CALLER_CHARSETS as readonly string[]).includes(value);
}

export type EncodingOptions = {
  /** Charset of byte strings handed to the client. Plain strings need none. */
  callerCharset?: CallerCharset;
};

const UNRESERVED = /[A-Za-z0-9_.\-~]/;

export class ServiceEncoding {
  readonly callerCharset: CallerCharset;

  constructor(options: EncodingOptions = {}) {
    this.callerCharset = options.callerCharset ?? "utf8";
  }

  encodeOutbound(text: string | Buffer): Buffer {
    const value = typeof text === "string" ? text : text.toString(this.callerCharset);
    const mappable = Array.from(value, (ch) => (ch.codePointAt(0) ?? 0) > 0xff ? "?" : ch).join("");
    return Buffer.from(mappable, SERVICE_CHARSET);
  }

  decodeInbound(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString(SERVICE_CHARSET);
  }

  escape(text: string | Buffer): string {
    let out = "";
    for (const byte of this.encodeOutbound(text)) {
      const ch = String.fromCharCode(byte);
      if (ch === " ") {
        out += "+";
      } else if (UNRESERVED.test(ch)) {
        out += ch;
      } else {
        out += "%" + byte.toString(16).toUpperCase().padStart(2, "0");
      }
    }
    return out;
  }

  encodeParameters(parameters: ReadonlyMap<string, string | number | Buffer>): Map<string, string> {
    const encoded = new Map<string, string>();
    for (const [key, value] of parameters) {
      encoded.set(key, this.escape(typeof value === "number" ? String(value) : value));
    }
    return encoded;
  }
}
