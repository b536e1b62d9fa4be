import { describe, expect, it, vi } from 'vitest';
import { fakeRequest, fakeResponse } from '../testing/httpDoubles';
import {
  AppError,
  CorruptAudioError,
  EmptyAudioError,
  UnsupportedFormatError,
  UnsupportedLanguageError,
  ValidationError,
} from '../utils/errors';
import { asyncHandler, errorHandler, notFoundHandler } from './errorHandler';

const handle = (error: Error) => {
  const { res, typed } = fakeResponse();
  errorHandler(error, fakeRequest(), typed, vi.fn<[err?: unknown], void>());
  return res;
};

describe('errorHandler', () => {
  it('uses the status and code of an AppError', () => {
    const res = handle(new AppError('Invalid API key.', 401, 'INVALID_API_KEY'));

    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({
      status: 'error',
      error: {
        code: 'INVALID_API_KEY',
        message: 'Invalid API key.',
        statusCode: 401,
        requestId: 'req_test',
        timestamp: expect.any(String),
      },
    });
  });

  it('includes validation details', () => {
    const res = handle(new ValidationError('Request validation failed', { errors: ['audio_base64 is required'] }));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json.mock.calls[0][0].error.details).toEqual({ errors: ['audio_base64 is required'] });
  });

  it.each([
    [new UnsupportedFormatError('aac'), 400, 'UNSUPPORTED_FORMAT', 'Unsupported audio format: aac'],
    [new UnsupportedLanguageError('klingon'), 400, 'UNSUPPORTED_LANGUAGE', 'Unsupported language: klingon'],
    [new CorruptAudioError('Audio payload is not a valid mp3 stream'), 422, 'CORRUPT_AUDIO', 'Audio payload is not a valid mp3 stream'],
    [new EmptyAudioError(), 422, 'EMPTY_AUDIO', 'Decoded audio contains no samples'],
  ])('maps %s to an HTTP response', (error, statusCode, code, message) => {
    const res = handle(error);

    expect(res.status).toHaveBeenCalledWith(statusCode);
    expect(res.json.mock.calls[0][0].error).toMatchObject({ code, message, statusCode });
  });

  it('maps malformed JSON to 400', () => {
    const res = handle(Object.assign(new SyntaxError('Unexpected token'), { body: '{' }));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json.mock.calls[0][0].error.code).toBe('INVALID_JSON');
  });

  it('maps an oversized body to 413', () => {
    const res = handle(Object.assign(new Error('request entity too large'), { type: 'entity.too.large' }));

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json.mock.calls[0][0].error.code).toBe('PAYLOAD_TOO_LARGE');
  });

  it('hides the message of unexpected errors', () => {
    const res = handle(new Error('connection to model store refused'));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json.mock.calls[0][0].error).toMatchObject({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
    expect(res.json.mock.calls[0][0].error.stack).toBeUndefined();
  });
});

describe('asyncHandler', () => {
  it('forwards a rejection to next', async () => {
    const failure = new CorruptAudioError('broken');
    const next = vi.fn();

    asyncHandler(async () => {
      throw failure;
    })(fakeRequest(), fakeResponse().typed, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalledWith(failure));
  });
});

describe('notFoundHandler', () => {
  it('responds with 404 and the route', () => {
    const { res, typed } = fakeResponse();

    notFoundHandler(fakeRequest({ method: 'GET', path: '/nope' }), typed);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json.mock.calls[0][0].error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Cannot GET /nope',
      statusCode: 404,
    });
  });
});
