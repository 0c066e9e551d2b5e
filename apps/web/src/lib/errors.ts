/**
 * Analysis Errors
 *
 * Hard failures that may leave the analysis pipeline. Parsing problems in the
 * generated text are never represented here; they are absorbed by the
 * extraction and salvage chain.
 *
 * @module errors
 */

/** Missing upstream credential. Checked once, before any call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Non-2xx upstream response, network failure or timeout. `status` is null when no response arrived. */
export class UpstreamTransportError extends Error {
  constructor(
    public readonly status: number | null,
    public readonly body: string,
    message: string,
    public readonly timedOut = false,
  ) {
    super(message);
    this.name = "UpstreamTransportError";
  }
}

/** The upstream API answered, but not with the expected candidates envelope. */
export class UpstreamFormatError extends Error {
  constructor(
    message: string,
    public readonly payloadPreview: string,
  ) {
    super(message);
    this.name = "UpstreamFormatError";
  }
}
