// Translate taxonomy errors into HTTP responses for the REST controllers
import { HttpException, HttpStatus } from '@nestjs/common';
import { ConversionError, ErrorCode, describeError, errorMessage } from './conversion-error';

export function httpStatusFor(code: ErrorCode): HttpStatus {
  switch (code) {
    case ErrorCode.QUEUE_CAPACITY_EXCEEDED:
      return HttpStatus.TOO_MANY_REQUESTS;
    case ErrorCode.FILE_NOT_FOUND:
      return HttpStatus.NOT_FOUND;
    default:
      return HttpStatus.BAD_REQUEST;
  }
}

export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof ConversionError) {
    const description = describeError(error.code);
    return new HttpException(
      {
        success: false,
        errorCode: error.code,
        message: description.message,
        suggestedAction: description.suggestedAction,
        detail: error.message,
      },
      httpStatusFor(error.code),
    );
  }
  return new HttpException(errorMessage(error), HttpStatus.INTERNAL_SERVER_ERROR);
}
