import { Logger } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import {
  GrpcFailedPreconditionException,
  GrpcInternalException,
  GrpcInvalidArgumentException,
  GrpcNotFoundException,
  GrpcUnavailableException,
} from '@genforge/proto';
import {
  InvalidTransitionException,
  JobNotCompletedException,
  JobNotFoundException,
  JobValidationException,
} from '../jobs/exceptions/job.exceptions';
import { ArtifactNotFoundException } from '../storage/exceptions/storage.exceptions';
import { TransientException } from '../common/exceptions/collaborator.exceptions';
import { errorMessage } from '../common/exceptions/error-details';

const logger = new Logger('GrpcErrorMapper');

/**
 * Translates domain exceptions into gRPC status codes.
 * Anything unrecognised is logged and surfaced as INTERNAL without details.
 */
export function toRpcException(error: unknown): RpcException {
  if (error instanceof RpcException) {
    return error;
  }
  if (
    error instanceof JobNotFoundException ||
    error instanceof ArtifactNotFoundException
  ) {
    return new GrpcNotFoundException(error.message);
  }
  if (
    error instanceof InvalidTransitionException ||
    error instanceof JobNotCompletedException
  ) {
    return new GrpcFailedPreconditionException(error.message);
  }
  if (error instanceof JobValidationException) {
    return new GrpcInvalidArgumentException(error.errors.join('; '));
  }
  if (error instanceof TransientException) {
    return new GrpcUnavailableException(error.message);
  }

  logger.error(`Unhandled error in gRPC handler: ${errorMessage(error)}`);
  return new GrpcInternalException('Internal error');
}
