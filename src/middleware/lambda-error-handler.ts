import { APIGatewayProxyResult } from 'aws-lambda';
import { AppError } from '../utils/errors/app-error';
import { HTTP_HEADERS, HTTP_STATUS } from '../constants/http';

interface ErrorResponse {
  status: string;
  code: string;
  message: string;
  details?: unknown;
}

export const handleLambdaError = (error: Error | AppError): APIGatewayProxyResult => {
  let response: ErrorResponse;
  let statusCode: number;

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    response = {
      status: 'error',
      code: error.code ?? 'APP_ERROR',
      message: error.message
    };

    console.warn(JSON.stringify({
      level: 'warn',
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      timestamp: new Date().toISOString()
    }));
  } else {
    statusCode = HTTP_STATUS.INTERNAL_SERVER_ERROR;
    response = {
      status: 'error',
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred'
    };

    console.error(JSON.stringify({
      level: 'error',
      message: 'Unexpected error occurred',
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack
      },
      timestamp: new Date().toISOString()
    }));

    // Include error details in development
    if (process.env.NODE_ENV === 'development') {
      response.details = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }
  }

  return {
    statusCode,
    headers: HTTP_HEADERS,
    body: JSON.stringify(response)
  };
};

export const wrapHandler = <TEvent>(
  handler: (event: TEvent) => Promise<APIGatewayProxyResult>
) => {
  return async (event: TEvent): Promise<APIGatewayProxyResult> => {
    try {
      return await handler(event);
    } catch (error) {
      return handleLambdaError(error instanceof Error ? error : new Error(String(error)));
    }
  };
};
