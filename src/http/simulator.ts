import { Buffer } from "node:buffer";
import { TransportError } from "../errors";
import { EarPositions, Transport } from "../types";
import { buildUrl } from "./client";
import { SERVICE_CHARSET } from "./encoding";

export type Language = "fr" | "en";

type Acknowledged = "tts" | "posleft" | "posright" | "chor";

const ACKS: Record<Language, Record<Acknowledged, string>> = {
  fr: {
    tts: "Votre texte a bien été transmis",
    posleft: "Votre changement d'oreilles gauche a été transmis",
    posright: "Votre changement d'oreilles droit a été transmis",
    chor: "Votre chorégraphie a bien été transmise",
  },
  en: {
    tts: "Your text was forwarded",
    posleft: "Your left change of ears was transmitted",
    posright: "Your right change of ears was transmitted",
    chor: "Your choreography was forwarded",
  },
};

const POSITIONS: Record<Language, { left: string; right: string }> = {
  fr: { left: "Position gauche", right: "Position droite" },
  en: { left: "Left position", right: "Right position" },
};

export type SimulatorOptions = {
  language?: Language;
  ears?: EarPositions;
  /** A sleeping rabbit does not report its ears. */
  asleep?: boolean;
};

export type RecordedRequest = {
  url: string;
  /** Parameter values after undoing the wire escaping. */
  parameters: Map<string, string>;
};

function unescape(value: string): string {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "+") {
      bytes.push(0x20);
    } else if (ch === "%" && /^[0-9A-Fa-f]{2}$/.test(value.slice(i + 1, i + 3))) {
      bytes.push(parseInt(value.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(ch.charCodeAt(0));
    }
  }
  return Buffer.from(bytes).toString(SERVICE_CHARSET);
}

/**
 * In-process stand-in for the rabbit's API. Acknowledges every command it
 * receives in the configured language and keeps track of the ears.
 */
export class SimulatedService implements Transport {
  readonly requests: RecordedRequest[] = [];
  language: Language;
  asleep: boolean;
  private ears: EarPositions;
  private failure: TransportError | null = null;
  private ignored = new Set<Acknowledged>();

  constructor(options: SimulatorOptions = {}) {
    this.language = options.language ?? "fr";
    this.asleep = options.asleep ?? false;
    this.ears = { ...(options.ears ?? { left: 0, right: 0 }) };
  }

  /** The next request fails as if the network were down. */
  failNext(message = "connect ECONNREFUSED"): void {
    this.failure = new TransportError({ url: "simulated", message });
  }

  /** Leave a field's command unacknowledged. */
  ignore(field: Acknowledged): void {
    this.ignored.add(field);
  }

  get earPositions(): EarPositions {
    return { ...this.ears };
  }

  async submitRequest(baseUri: string, parameters: ReadonlyMap<string, string>): Promise<Uint8Array> {
    const url = buildUrl(baseUri, parameters);
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }

    const decoded = new Map<string, string>();
    for (const [key, value] of parameters) decoded.set(key, unescape(value));
    this.requests.push({ url, parameters: decoded });

    const lines: string[] = [];
    const acks = ACKS[this.language];
    for (const field of ["tts", "posleft", "posright", "chor"] as const) {
      const value = decoded.get(field);
      if (value === undefined || this.ignored.has(field)) continue;
      if (field === "posleft") this.ears.left = Number(value);
      if (field === "posright") this.ears.right = Number(value);
      lines.push(acks[field]);
    }

    if (decoded.get("ears") === "ok" && !this.asleep) {
      const labels = POSITIONS[this.language];
      lines.push(`${labels.left} = ${this.ears.left}`, `${labels.right} = ${this.ears.right}`);
    }

    return Buffer.from(lines.join("     ") + "   ", SERVICE_CHARSET);
  }
}
