import { Buffer } from "node:buffer";
import { ChoreographyProgram, compileChoreography } from "./choreography/compiler";
import { ConfigurationError, NabaztagError } from "./errors";
import { ServiceEncoding } from "./http/encoding";
import { Message } from "./message/message";
import { DispatchResult, EarPositions, Identity, Transport } from "./types";
import { DEFAULT_API_URI } from "./utils/env";
import { Logger } from "./utils/logger";

/**
 * Voices the API documents, by language. Not validated against: the service
 * adds voices from time to time. A voice's language wins over the rabbit's.
 */
export const VOICES = {
  fr: ["julie22k", "claire22s"],
  en: ["graham22s", "lucy22s", "heather22k", "ryan22k", "aaron22s", "laura22s"],
} as const;

export const BARK = "ouah ouah";

export const EAR_POSITION_MAX = 16;

function earPosition(side: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Expected a number for the ${side} ear, got ${value}`);
  }
  const position = Math.trunc(value);
  if (position < 0 || position > EAR_POSITION_MAX) {
    throw new ConfigurationError(
      `${side} ear position must be between 0 and ${EAR_POSITION_MAX}, got ${value}`
    );
  }
  return position;
}

export type NabaztagOptions = {
  transport: Transport;
  logger: Logger;
  encoding?: ServiceEncoding;
  baseUri?: string;
};

/**
 * Queues commands for one rabbit and sends them together in a single request.
 *
 * ```ts
 * const rabbit = new Nabaztag({ serial, token }, { transport, logger });
 * rabbit.say("bonjour"); // nothing sent yet
 * rabbit.moveEars(4, 4); // still nothing
 * await rabbit.send();   // one request with both
 * ```
 *
 * Issuing the same command twice before `send` keeps only the second. The
 * service gets confused by requests in quick succession, and when speech and
 * a choreography share a request only the speech reaches the rabbit.
 */
export class Nabaztag {
  readonly identity: Identity;
  private transport: Transport;
  private logger: Logger;
  private encoding: ServiceEncoding;
  private baseUri: string;
  private pending: Message;
  private inFlight = false;

  constructor(identity: Identity, options: NabaztagOptions) {
    this.identity = Object.freeze({ ...identity });
    this.transport = options.transport;
    this.logger = options.logger;
    this.encoding = options.encoding ?? new ServiceEncoding();
    this.baseUri = options.baseUri ?? DEFAULT_API_URI;
    this.pending = this.newMessage();
  }

  /** The batch that the next `send` dispatches. */
  get message(): Message {
    return this.pending;
  }

  get sending(): boolean {
    return this.inFlight;
  }

  /**
   * Sends everything queued. Commands issued while the request is out go into
   * the next batch. A failed batch is put back unless newer commands were
   * queued meanwhile; call `discard` to drop it instead of resending.
   */
  async send(): Promise<DispatchResult> {
    this.ensureIdle();
    const batch = this.pending;
    this.pending = this.newMessage();
    this.inFlight = true;
    try {
      return await batch.dispatch();
    } catch (err) {
      if (this.pending.isEmpty) {
        this.pending = batch;
      } else {
        this.logger.warn("Failed batch dropped, newer commands are queued", {
          verifiers: Array.from(batch.verifiers.keys()),
        });
      }
      throw err;
    } finally {
      this.inFlight = false;
    }
  }

  discard(): void {
    if (!this.pending.isEmpty) {
      this.logger.debug("Pending commands discarded", {
        verifiers: Array.from(this.pending.verifiers.keys()),
      });
    }
    this.pending = this.newMessage();
  }

  /** Queries the ears right away, leaving the pending batch alone. */
  async earPositions(): Promise<EarPositions | null> {
    this.ensureIdle();
    const query = this.newMessage();
    query.setField("ears", "ok");
    this.inFlight = true;
    try {
      const result = await query.dispatch();
      return result.earPositions;
    } finally {
      this.inFlight = false;
    }
  }

  say(text: string | Buffer): void {
    this.pending.setField("tts", text);
    this.pending.registerVerifier("Speech", "say");
  }

  async sayAndSend(text: string | Buffer): Promise<DispatchResult> {
    this.ensureIdle();
    this.say(text);
    return this.send();
  }

  bark(): void {
    this.say(BARK);
  }

  async barkAndSend(): Promise<DispatchResult> {
    this.ensureIdle();
    this.bark();
    return this.send();
  }

  /**
   * Ear positions run 0-16; they are not degrees and the direction cannot be
   * chosen (use a choreography for that). A null side stays where it is.
   */
  moveEars(left: number | null | undefined, right: number | null | undefined): void {
    const posleft = left === null || left === undefined ? null : earPosition("left", left);
    const posright = right === null || right === undefined ? null : earPosition("right", right);
    if (posleft !== null) {
      this.pending.setField("posleft", posleft);
      this.pending.registerVerifier("Left ear", "leftEar");
    }
    if (posright !== null) {
      this.pending.setField("posright", posright);
      this.pending.registerVerifier("Right ear", "rightEar");
    }
  }

  async moveEarsAndSend(
    left: number | null | undefined,
    right: number | null | undefined
  ): Promise<DispatchResult> {
    this.ensureIdle();
    this.moveEars(left, right);
    return this.send();
  }

  /**
   * Compiles `program` and queues it.
   *
   * ```ts
   * rabbit.choreography("wave", (c) => {
   *   c.group((c) => c.setLed("middle", "green").setLed("left", "red"));
   *   c.setLed("right", "yellow");
   * });
   * ```
   */
  choreography(program: ChoreographyProgram): void;
  choreography(title: string | undefined, program: ChoreographyProgram): void;
  choreography(
    titleOrProgram: string | undefined | ChoreographyProgram,
    maybeProgram?: ChoreographyProgram
  ): void {
    let title: string | undefined;
    let program: ChoreographyProgram | undefined;
    if (typeof titleOrProgram === "function") {
      program = titleOrProgram;
    } else {
      title = titleOrProgram;
      program = maybeProgram;
    }
    if (!program) {
      throw new TypeError("choreography needs a program");
    }
    const chor = compileChoreography(program);
    this.pending.setField("chortitle", title);
    this.pending.setField("chor", chor);
    this.pending.registerVerifier("Choreography", "choreography");
  }

  choreographyAndSend(program: ChoreographyProgram): Promise<DispatchResult>;
  choreographyAndSend(title: string | undefined, program: ChoreographyProgram): Promise<DispatchResult>;
  async choreographyAndSend(
    titleOrProgram: string | undefined | ChoreographyProgram,
    maybeProgram?: ChoreographyProgram
  ): Promise<DispatchResult> {
    this.ensureIdle();
    if (typeof titleOrProgram === "function") {
      this.choreography(titleOrProgram);
    } else if (maybeProgram) {
      this.choreography(titleOrProgram, maybeProgram);
    } else {
      throw new TypeError("choreography needs a program");
    }
    return this.send();
  }

  private ensureIdle(): void {
    if (this.inFlight) {
      throw new NabaztagError("A request is already in flight; wait for it before sending again");
    }
  }

  private newMessage(): Message {
    return new Message({
      identity: this.identity,
      baseUri: this.baseUri,
      transport: this.transport,
      encoding: this.encoding,
      logger: this.logger,
    });
  }
}
