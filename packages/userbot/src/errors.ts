import { RelayError, truncate } from '@filerelay/core';

/** RPC errors meaning the forwarded copy can no longer be fetched */
const EXPIRED_ERRORS = [
  'FILE_REFERENCE_EXPIRED',
  'FILE_REFERENCE_INVALID',
  'FILE_REFERENCE_EMPTY',
  'MESSAGE_ID_INVALID',
  'MSG_ID_INVALID',
];

/** Fields gramjs puts on `RPCError` and `FloodWaitError` */
interface RpcErrorFields {
  code?: unknown;
  errorMessage?: unknown;
  seconds?: unknown;
}

function rpcFields(err: unknown): RpcErrorFields {
  if (typeof err !== 'object' || err === null) return {};
  return {
    code: 'code' in err ? err.code : undefined,
    errorMessage: 'errorMessage' in err ? err.errorMessage : undefined,
    seconds: 'seconds' in err ? err.seconds : undefined,
  };
}

/**
 * Map an MTProto failure onto the relay's failure kinds. gramjs throws
 * `FloodWaitError` (code 420, with `seconds`) for throttling and `RPCError`
 * subclasses carrying the server's error name for everything else.
 */
export function classifyMtprotoError(err: unknown, context: string): RelayError {
  if (err instanceof RelayError) return err;

  const detail = err instanceof Error ? err.message : String(err);
  const { code, errorMessage, seconds } = rpcFields(err);

  if (code === 420 || typeof seconds === 'number') {
    const wait = typeof seconds === 'number' ? seconds : 0;
    return new RelayError('rate_limited', `${context}: flood wait of ${wait}s`, {
      retryAfterMs: wait * 1000,
      cause: err,
    });
  }

  const name = typeof errorMessage === 'string' ? errorMessage : '';
  const expired = EXPIRED_ERRORS.find((e) => name === e || detail.includes(e));
  if (expired) {
    return new RelayError('expired', `${context}: ${expired}`, { cause: err });
  }

  return new RelayError('transport', truncate(`${context}: ${detail}`, 200), { cause: err });
}
