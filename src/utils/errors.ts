/**
 * Error taxonomy
 * Every failure in a run maps to exactly one of these kinds
 */

export type HarvestErrorKind =
  | "config"
  | "transport"
  | "protocol"
  | "decode"
  | "io";

interface HarvestErrorOptions {
  cause?: unknown;
}

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, options: HarvestErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
  }
}

/**
 * Bad input to URL construction or a missing setting
 */
export class ConfigError extends HarvestError {
  readonly kind = "config" as const;
}

/**
 * Network-level failure: the request never produced a readable response
 */
export class TransportError extends HarvestError {
  readonly kind = "transport" as const;

  constructor(
    message: string,
    readonly url: string,
    options: HarvestErrorOptions = {},
  ) {
    super(`${message}, url: ${url}`, options);
  }
}

/**
 * Non-200 response from either endpoint
 */
export class ProtocolError extends HarvestError {
  readonly kind = "protocol" as const;

  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`Got non-200 response (HTTP ${status}), url: ${url}`);
  }
}

/**
 * Page body is not JSON or does not match the page shape
 * Keeps the raw body for diagnosis
 */
export class DecodeError extends HarvestError {
  readonly kind = "decode" as const;

  constructor(
    message: string,
    readonly url: string,
    readonly body: string,
    options: HarvestErrorOptions = {},
  ) {
    super(`${message}, url: ${url}`, options);
  }
}

/**
 * Local file or directory could not be created or written
 */
export class IOError extends HarvestError {
  readonly kind = "io" as const;

  constructor(
    message: string,
    readonly path: string,
    options: HarvestErrorOptions = {},
  ) {
    super(`${message} ${path}${describeCause(options.cause)}`, options);
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return "";
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}
