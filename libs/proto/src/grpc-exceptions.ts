/**
 * gRPC exception classes shared by the worker and its callers.
 *
 * Each wraps RpcException with the matching gRPC status code.
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
