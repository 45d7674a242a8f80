/**
 * Typed errors for the pool price client.
 *
 * Every error carries a machine-readable code next to its message, so the
 * entry point can report what failed without matching on message text.
 */

/**
 * Base error class for all client errors.
 */
export class PriceClientError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PriceClientError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing or unparsable configuration. Raised before any network activity.
 */
export class ConfigError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Endpoint unreachable or the connection dropped.
 */
export class NetworkError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NETWORK_ERROR', message, details);
    this.name = 'NetworkError';
  }
}

/**
 * The endpoint answered with an error (bad key, rate limit, server fault).
 */
export class RpcError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RPC_ERROR', message, details);
    this.name = 'RpcError';
  }
}

/**
 * A contract call reverted or returned no data.
 */
export class ContractCallError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CALL_EXCEPTION', message, details);
    this.name = 'ContractCallError';
  }
}

export class MalformedResponseError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_RESPONSE', message, details);
    this.name = 'MalformedResponseError';
  }
}

/**
 * The factory has no pool for the pair and fee tier.
 */
export class PoolNotFoundError extends PriceClientError {
  constructor(tokenA: string, tokenB: string, fee: number) {
    super('POOL_NOT_FOUND', `Pool not found for tokens ${tokenA} / ${tokenB} at fee ${fee}`, {
      tokenA,
      tokenB,
      fee,
    });
    this.name = 'PoolNotFoundError';
  }
}

/**
 * The pool reports a token pair other than the one it was looked up with.
 */
export class PoolMismatchError extends PriceClientError {
  constructor(pool: string, expected: [string, string], actual: [string, string]) {
    super(
      'POOL_TOKEN_MISMATCH',
      `Pool ${pool} holds ${actual[0]} / ${actual[1]}, expected ${expected[0]} / ${expected[1]}`,
      { pool, expected, actual },
    );
    this.name = 'PoolMismatchError';
  }
}

export class AbiMismatchError extends PriceClientError {
  constructor(method: string) {
    super('ABI_MISMATCH', `ABI mismatch: ${method}`, { method });
    this.name = 'AbiMismatchError';
  }
}

/**
 * Division by zero, or a fixed-width value outside its range.
 */
export class PriceMathError extends PriceClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ARITHMETIC_ERROR', message, details);
    this.name = 'PriceMathError';
  }
}

const SOCKET_ERRORS = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'ENETUNREACH'];
const TRANSPORT_CODES = ['NETWORK_ERROR', 'TIMEOUT', 'SERVER_ERROR', ...SOCKET_ERRORS];

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    if (typeof code === 'string') return code;
  }
  return undefined;
}

function nestedError(err: unknown, key: string): unknown {
  if (err && typeof err === 'object' && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

/**
 * ethers v5 reports any failed `eth_call` as CALL_EXCEPTION and keeps the
 * transport failure underneath on `error`. A revert has no such cause.
 */
function transportCause(err: unknown): unknown {
  const cause = nestedError(err, 'error');
  const code = errorCode(cause);
  return code && TRANSPORT_CODES.includes(code) ? cause : undefined;
}

/**
 * Replace the API key in `https://<host>/v2/<key>` URLs that ethers echoes
 * into its error messages.
 */
export function redactApiKey(text: string): string {
  return text.replace(/\/v2\/[^\s"'\\/?#]+/g, '/v2/<redacted>');
}

/**
 * Map a raw error (usually one thrown by ethers) to the typed hierarchy.
 *
 * ethers v5 tags its errors with a `code` string; that is checked first,
 * then the message for socket and HTTP status hints.
 */
export function mapError(err: unknown, details?: Record<string, unknown>): PriceClientError {
  if (err instanceof PriceClientError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const normalizedMessage = message.toLowerCase();
  const code = errorCode(err);

  switch (code) {
    case 'CALL_EXCEPTION': {
      const cause = transportCause(err);
      if (cause !== undefined) return mapError(cause, details);
      return new ContractCallError(message, { ...details, cause: err });
    }
    case 'NETWORK_ERROR':
    case 'TIMEOUT':
      return new NetworkError(message, { ...details, cause: err });
    case 'SERVER_ERROR': {
      // "missing response": the request never got an HTTP answer
      const serverCode = errorCode(nestedError(err, 'serverError'));
      if (serverCode && SOCKET_ERRORS.includes(serverCode)) {
        return new NetworkError(message, { ...details, cause: err });
      }
      return new RpcError(message, { ...details, cause: err });
    }
  }

  if ((code && SOCKET_ERRORS.includes(code)) || SOCKET_ERRORS.some(name => message.includes(name))) {
    return new NetworkError(message, { ...details, cause: err });
  }

  if (
    normalizedMessage.includes('rate limit') ||
    normalizedMessage.includes('too many requests') ||
    normalizedMessage.includes('unauthorized') ||
    message.includes('429') ||
    message.includes('401')
  ) {
    return new RpcError(message, { ...details, cause: err });
  }

  return new PriceClientError('UNKNOWN_ERROR', message, { ...details, cause: err });
}

/**
 * One-line report for the console, with the API key stripped from any URL.
 */
export function describeError(err: unknown): string {
  const error = mapError(err);
  return redactApiKey(`${error.name} [${error.code}]: ${error.message}`);
}
