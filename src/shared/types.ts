export interface LoggerService {
  app: string;
  error(message: string, stack?: string): Promise<void>;
  log(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  debug(message: string): Promise<void>;
}

export const LOGGER_SERVICE = 'LOGGER_SERVICE';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
