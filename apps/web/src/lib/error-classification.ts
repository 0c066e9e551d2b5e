/**
 * Error Classification
 *
 * Classifies analysis errors to decide whether a failed upstream attempt may be
 * retried and how the failure is reported at the HTTP boundary.
 *
 * @module error-classification
 */

import { ConfigurationError, UpstreamFormatError, UpstreamTransportError } from "./errors";

export type ErrorCategory =
  | "configuration"
  | "upstream_transport"
  | "malformed_response"
  | "timeout"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  /** HTTP status the analyze route answers with. */
  httpStatus: number;
  userMessage: string;
  retriable: boolean;
  upstreamStatus: number | null;
  upstreamBody: string | null;
};

export const USER_MESSAGES = {
  configuration: "GEMINI_API_KEY is not set.",
  upstream: "Analysis failed upstream. Please try again.",
  malformed: "Model response was malformed. Please try again.",
  unexpected: "Unexpected server error. Check server logs.",
} as const;

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
];

function readField(error: unknown, field: string): unknown {
  if (typeof error !== "object" || error === null || !(field in error)) return undefined;
  return Reflect.get(error, field);
}

/** Shape-check for UpstreamTransportError across module boundaries */
function isTransportErrorShape(error: unknown): boolean {
  const status = readField(error, "status");
  return (
    readField(error, "name") === "UpstreamTransportError" &&
    (typeof status === "number" || status === null) &&
    typeof readField(error, "body") === "string"
  );
}

function transport(
  message: string,
  status: number | null,
  body: string,
  timedOut: boolean,
): ClassifiedError {
  return {
    category: timedOut ? "timeout" : "upstream_transport",
    message,
    httpStatus: 502,
    userMessage: USER_MESSAGES.upstream,
    retriable: true,
    upstreamStatus: status,
    upstreamBody: body,
  };
}

/**
 * Classify an error thrown by the analysis pipeline.
 */
export function classifyAnalysisError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof ConfigurationError || name === "ConfigurationError") {
    return {
      category: "configuration",
      message: msg,
      httpStatus: 503,
      userMessage: USER_MESSAGES.configuration,
      retriable: false,
      upstreamStatus: null,
      upstreamBody: null,
    };
  }

  if (error instanceof UpstreamTransportError) {
    return transport(msg, error.status, error.body, error.timedOut);
  }
  if (isTransportErrorShape(error)) {
    const status = readField(error, "status");
    const body = readField(error, "body");
    return transport(
      msg,
      typeof status === "number" ? status : null,
      typeof body === "string" ? body : "",
      readField(error, "timedOut") === true,
    );
  }

  if (error instanceof UpstreamFormatError || name === "UpstreamFormatError") {
    return {
      category: "malformed_response",
      message: msg,
      httpStatus: 502,
      userMessage: USER_MESSAGES.malformed,
      retriable: false,
      upstreamStatus: null,
      upstreamBody: null,
    };
  }

  // Raw timeouts that were not wrapped by the client
  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return transport(msg, null, "", true);
  }

  return {
    category: "unknown",
    message: msg,
    httpStatus: 500,
    userMessage: USER_MESSAGES.unexpected,
    retriable: false,
    upstreamStatus: null,
    upstreamBody: null,
  };
}
