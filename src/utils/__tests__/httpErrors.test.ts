import { AppError, ErrorKind } from '../errors';
import { handleRouteError, toErrorResponse } from '../httpErrors';

describe('toErrorResponse', () => {
  it.each([
    [ErrorKind.INVALID_INPUT, 400],
    [ErrorKind.UNAUTHORIZED, 401],
    [ErrorKind.NOT_FOUND, 404],
    [ErrorKind.ALREADY_DELETED, 409],
    [ErrorKind.CONFLICT, 409],
    [ErrorKind.WEATHER_UNAVAILABLE, 502],
    [ErrorKind.STORAGE_ERROR, 500],
  ])('maps %s to HTTP %d', (kind, status) => {
    expect(toErrorResponse(new AppError(kind, 'boom'))).toEqual({
      status,
      body: { error: 'boom', kind },
    });
  });

  it('hides the message of unexpected errors', () => {
    expect(toErrorResponse(new Error('connection string leaked'))).toEqual({
      status: 500,
      body: { error: 'Server error' },
    });
  });
});

describe('handleRouteError', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it.each([
    { error: new AppError(ErrorKind.NOT_FOUND, 'Review with ID 9 not found'), status: 404 },
    { error: new Error('socket hang up'), status: 500 },
  ])('logs the route label and answers $status', ({ error, status }) => {
    const logged = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const json = jest.fn();
    const res = { status: jest.fn((_code: number) => ({ json })) };

    handleRouteError(res, error, 'GET /api/reviews/:id');

    expect(logged).toHaveBeenCalledWith('[GET /api/reviews/:id] Error:', error);
    expect(res.status).toHaveBeenCalledWith(status);
    expect(json).toHaveBeenCalledWith(toErrorResponse(error).body);
  });
});
