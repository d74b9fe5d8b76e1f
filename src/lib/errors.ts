export type GatewayErrorCode =
  | "InvalidProxyFormat"
  | "ProxyUnreachable"
  | "UnsupportedCipher"
  | "BridgeStartupFailed"
  | "ConfigurationError"
  | "PortalUnreachable"
  | "HandshakeFailed"
  | "AuthExpired"
  | "MalformedResponse"
  | "AllEndpointsExhausted"
  | "UpstreamTransient"
  | "UpstreamAuthFailure"
  | "NoMacAvailable"
  | "AdmissionDenied"
  | "StreamNotFound"
  | "PlaybackUnavailable";

const DEFAULT_STATUS: Record<GatewayErrorCode, number> = {
  InvalidProxyFormat: 400,
  ProxyUnreachable: 502,
  UnsupportedCipher: 400,
  BridgeStartupFailed: 502,
  ConfigurationError: 500,
  PortalUnreachable: 502,
  HandshakeFailed: 502,
  AuthExpired: 502,
  MalformedResponse: 502,
  AllEndpointsExhausted: 502,
  UpstreamTransient: 502,
  UpstreamAuthFailure: 502,
  NoMacAvailable: 503,
  AdmissionDenied: 429,
  StreamNotFound: 404,
  PlaybackUnavailable: 503,
};

export interface GatewayErrorOptions {
  status?: number;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  readonly status: number;

  readonly details: Record<string, unknown>;

  constructor(code: GatewayErrorCode, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GatewayError";
    this.code = code;
    this.status = options.status ?? DEFAULT_STATUS[code];
    this.details = options.details ?? {};
  }
}

export const isGatewayError = (
  error: unknown,
  ...codes: GatewayErrorCode[]
): error is GatewayError =>
  error instanceof GatewayError && (codes.length === 0 || codes.includes(error.code));

export const describeError = (error: unknown): string => {
  if (error instanceof GatewayError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
};
