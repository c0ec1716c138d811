export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  statusCode?: number;
}

function readStringField(source: object, field: string): string | undefined {
  const value: unknown = Reflect.get(source, field);
  return typeof value === 'string' ? value : undefined;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readStringField(error, 'code');
    if (code) {
      serialized.code = code;
    }

    const statusCode: unknown = Reflect.get(error, 'statusCode');
    if (typeof statusCode === 'number') {
      serialized.statusCode = statusCode;
    }

    if (error.cause !== undefined && error.cause !== null) {
      serialized.cause = serializeError(error.cause);
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    return {
      message: readStringField(error, 'message') ?? readStringField(error, 'error') ?? JSON.stringify(error),
      name: readStringField(error, 'name'),
      code: readStringField(error, 'code'),
    };
  }

  return { message: String(error) };
}
