/**
 * gRPC exception classes.
 *
 * These wrap RpcException with the gRPC status code so that the worker and
 * its callers share the same error contract.
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';

export class GrpcNotFoundException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.NOT_FOUND,
      message,
    });
  }
}

export class GrpcInvalidArgumentException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INVALID_ARGUMENT,
      message,
    });
  }
}

/** The job exists but its current status does not allow the operation */
export class GrpcFailedPreconditionException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.FAILED_PRECONDITION,
      message,
    });
  }
}

export class GrpcInternalException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INTERNAL,
      message,
    });
  }
}

export class GrpcUnavailableException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.UNAVAILABLE,
      message,
    });
  }
}
