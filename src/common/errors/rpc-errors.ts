import { Logger } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';

export interface RpcErrorPayload {
  status: number;
  message: string;
}

export const isRpcErrorPayload = (value: unknown): value is RpcErrorPayload =>
  typeof value === 'object' &&
  value !== null &&
  'status' in value &&
  typeof value.status === 'number' &&
  'message' in value &&
  typeof value.message === 'string';

const isConstraintViolation = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('SQLITE_CONSTRAINT');

/**
 * Passes RpcExceptions through and converts anything else, logging it first.
 * Constraint violations are the caller's fault; every other failure is ours.
 */
export function toRpcException(error: unknown, logger: Logger): RpcException {
  if (error instanceof RpcException) {
    return error;
  }

  if (isConstraintViolation(error)) {
    return new RpcException({ status: 400, message: error.message });
  }

  logger.error(error);
  return new RpcException({ status: 500, message: 'Internal server error' });
}
