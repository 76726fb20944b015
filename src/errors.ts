export class NabaztagError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NabaztagError";
  }
}

/** Unknown symbolic name (colour, ear, LED, direction) or bad configuration value. */
export class ConfigurationError extends NabaztagError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TransportError extends NabaztagError {
  readonly url: string;
  readonly status?: number;
  readonly responseText?: string;

  constructor(args: {
    url: string;
    message: string;
    status?: number;
    responseText?: string;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "TransportError";
    this.url = args.url;
    this.status = args.status;
    this.responseText = args.responseText;
  }
}

/**
 * The HTTP exchange worked but the service did not acknowledge a command.
 * `label` names the first command whose verifier rejected the response.
 */
export class ServiceError extends NabaztagError {
  readonly label: string;
  readonly response: string;

  constructor(label: string, response: string) {
    super(`${label}: ${response}`);
    this.name = "ServiceError";
    this.label = label;
    this.response = response;
  }
}
