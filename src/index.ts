import dotenv from "dotenv";
import { HttpTransport } from "./http/client";
import { ServiceEncoding } from "./http/encoding";
import { Nabaztag } from "./nabaztag";
import { loadEnv } from "./utils/env";
import { createLogger } from "./utils/logger";

export { Nabaztag, VOICES, BARK, EAR_POSITION_MAX } from "./nabaztag";
export type { NabaztagOptions } from "./nabaztag";
export { Message } from "./message/message";
export type { MessageContext } from "./message/message";
export {
  SUCCESS_RESPONSES,
  EAR_POSITION_RESPONSES,
  normalizeResponse,
  decodeEarPositions,
  verify,
} from "./message/responses";
export { Choreography, compileChoreography, DEFAULT_TEMPO, ACTION_KINDS } from "./choreography/compiler";
export type { ActionRecord, ChoreographyProgram } from "./choreography/compiler";
export { LED_COLORS, LEDS, EARS, EAR_DIRECTIONS } from "./choreography/tables";
export type { ColorName, LedName, EarName, EarDirection, Rgb } from "./choreography/tables";
export { HttpTransport, buildUrl } from "./http/client";
export { ServiceEncoding, SERVICE_CHARSET } from "./http/encoding";
export type { CallerCharset, EncodingOptions } from "./http/encoding";
export { SimulatedService } from "./http/simulator";
export { NabaztagError, ConfigurationError, TransportError, ServiceError } from "./errors";
export { loadEnv, DEFAULT_API_URI } from "./utils/env";
export type { Env } from "./utils/env";
export { createLogger } from "./utils/logger";
export type { Logger, Level } from "./utils/logger";
export * from "./types";

/** Reads `.env` and the environment, and wires a client to the real API. */
export function createNabaztagFromEnv(): Nabaztag {
  dotenv.config();
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const transport = new HttpTransport(logger, { timeoutMs: env.NABAZTAG_HTTP_TIMEOUT_MS });
  const encoding = new ServiceEncoding({ callerCharset: env.NABAZTAG_CALLER_CHARSET });

  logger.info("Nabaztag client configured", {
    serial: env.NABAZTAG_SERIAL,
    voice: env.NABAZTAG_VOICE,
    apiUri: env.NABAZTAG_API_URI,
  });

  return new Nabaztag(
    { serial: env.NABAZTAG_SERIAL, token: env.NABAZTAG_TOKEN, voice: env.NABAZTAG_VOICE },
    { transport, logger, encoding, baseUri: env.NABAZTAG_API_URI }
  );
}
