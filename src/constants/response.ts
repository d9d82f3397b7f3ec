import { HttpException } from '@nestjs/common';
import { isAppException } from '../common/exceptions/app.exception';

export interface ErrorBody {
  error: string;
  details?: string;
}

export interface MessageBody {
  message: string;
}

function messageFromResponse(response: string | object, fallback: string) {
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const message = response.message;
    // ValidationPipe reports one message per failed constraint
    if (Array.isArray(message)) return message.map(String).join(', ');
    if (typeof message === 'string') return message;
  }
  return fallback;
}

/**
 * Standardized JSON error body: `{ error, details? }`.
 * Extracts details from AppException when available.
 */
export const errorResponse = (exception: HttpException): ErrorBody => {
  if (isAppException(exception)) {
    const body = exception.getBody();
    return body.details === null
      ? { error: body.message }
      : { error: body.message, details: body.details };
  }

  return {
    error: messageFromResponse(exception.getResponse(), exception.message),
  };
};

export const messageResponse = (message: string): MessageBody => ({
  message,
});
