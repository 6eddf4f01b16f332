import { isAppError } from './errors';

export interface ErrorBody {
  error: string;
  kind?: string;
}

// The part of Express' Response a route error needs.
export interface JsonResponder {
  status(code: number): { json(body: ErrorBody): unknown };
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (isAppError(err)) {
    return { status: err.status, body: { error: err.message, kind: err.kind } };
  }
  return { status: 500, body: { error: 'Server error' } };
}

// Logs with the route label and answers with the status of the error kind.
export function handleRouteError(res: JsonResponder, err: unknown, label: string): void {
  const { status, body } = toErrorResponse(err);
  console.error(`[${label}] Error:`, err);
  res.status(status).json(body);
}
