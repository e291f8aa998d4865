import { describe, expect, it } from 'vitest';
import {
  InstrumentationAuthError,
  InstrumentationConstraintError,
  InstrumentationError,
  InstrumentationNotFoundError,
  InstrumentationServerError,
  InstrumentationValidationError,
  createInstrumentationError,
} from '../../src/errors.js';
import { InstrumentationClient } from '../../src/client.js';
import { createFetchMock, jsonResponse } from '../fixtures/fetch.js';

const PROJECT = '3f9a2c1e-8b7d-4e6f-a5c4-2b1d0e9f8a7c';

function clientFor(fetchMock: typeof globalThis.fetch, timeoutMs?: number) {
  return new InstrumentationClient({
    token: 'test-token',
    baseUrl: 'https://monitoring.example.test/v1',
    fetch: fetchMock,
    timeoutMs,
  });
}

describe('error mapping', () => {
  it('maps status codes to specialized error types', () => {
    expect(
      createInstrumentationError('auth', { status: 401, code: 'UNAUTHENTICATED' }),
    ).toBeInstanceOf(InstrumentationAuthError);
    expect(
      createInstrumentationError('forbidden', { status: 403, code: 'FORBIDDEN' }),
    ).toBeInstanceOf(InstrumentationAuthError);
    expect(
      createInstrumentationError('missing', { status: 404, code: 'NOT_FOUND' }),
    ).toBeInstanceOf(InstrumentationNotFoundError);
    expect(
      createInstrumentationError('validation', { status: 400, code: 'VALIDATION_ERROR' }),
    ).toBeInstanceOf(InstrumentationValidationError);
    expect(
      createInstrumentationError('boom', { status: 503, code: 'HTTP_503' }),
    ).toBeInstanceOf(InstrumentationServerError);

    const other = createInstrumentationError('teapot', { status: 418, code: 'HTTP_418' });
    expect(other).toBeInstanceOf(InstrumentationError);
    expect(other).not.toBeInstanceOf(InstrumentationServerError);
  });

  it('carries code and details from the error envelope', async () => {
    const { fetchMock } = createFetchMock(() =>
      jsonResponse(
        {
          error: {
            code: 'BAD_REQUEST',
            message: 'Instrument names must be unique within a project',
            details: [{ project_id: PROJECT, name: 'Well 1', reason: 'exists' }],
          },
        },
        400,
      ),
    );

    const error = await clientFor(fetchMock)
      .createInstruments({
        name: 'Well 1',
        typeId: 'type',
        statusId: 'status',
        projectId: PROJECT,
        geometry: { type: 'Point', coordinates: [0, 0] },
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InstrumentationValidationError);
    if (!(error instanceof InstrumentationValidationError)) return;
    expect(error.status).toBe(400);
    expect(error.code).toBe('BAD_REQUEST');
    expect(error.message).toBe('Instrument names must be unique within a project');
    expect(error.details).toEqual([{ project_id: PROJECT, name: 'Well 1', reason: 'exists' }]);
  });

  it('reads instrument name conflicts out of a BAD_REQUEST', () => {
    const error = createInstrumentationError('Instrument names must be unique within a project', {
      status: 400,
      code: 'BAD_REQUEST',
      details: [
        { project_id: PROJECT, name: 'Well 1', reason: 'exists' },
        { project_id: null, name: 'WELL 2', reason: 'duplicate_in_payload' },
        { name: 'ignored', reason: 'unknown' },
      ],
    });

    expect(error).toBeInstanceOf(InstrumentationValidationError);
    if (!(error instanceof InstrumentationValidationError)) return;
    expect(error.nameConflicts).toEqual([
      { projectId: PROJECT, name: 'Well 1', reason: 'exists' },
      { projectId: null, name: 'WELL 2', reason: 'duplicate_in_payload' },
    ]);
    expect(error.issues).toEqual([]);
  });

  it('reads field issues out of a VALIDATION_ERROR', () => {
    const error = createInstrumentationError('Invalid request data', {
      status: 400,
      code: 'VALIDATION_ERROR',
      details: [
        { code: 'invalid_string', path: [0, 'items', 1, 'time'], message: 'Invalid datetime' },
        { path: 'not-a-path', message: 'dropped' },
      ],
    });

    expect(error).toBeInstanceOf(InstrumentationValidationError);
    if (!(error instanceof InstrumentationValidationError)) return;
    expect(error.issues).toEqual([{ path: [0, 'items', 1, 'time'], message: 'Invalid datetime' }]);
    expect(error.nameConflicts).toEqual([]);
  });

  it('maps a constraint violation with its constraint name', () => {
    const error = createInstrumentationError('Request conflicts with stored data', {
      status: 400,
      code: 'CONSTRAINT_VIOLATION',
      details: { constraint: 'project_unique_timeseries' },
    });

    expect(error).toBeInstanceOf(InstrumentationConstraintError);
    expect(error).toBeInstanceOf(InstrumentationValidationError);
    if (!(error instanceof InstrumentationConstraintError)) return;
    expect(error.constraint).toBe('project_unique_timeseries');
    expect(error.name).toBe('InstrumentationConstraintError');
  });

  it('maps a 404 response to InstrumentationNotFoundError', async () => {
    const { fetchMock } = createFetchMock(() =>
      jsonResponse({ error: { code: 'NOT_FOUND', message: `project ${PROJECT} not found` } }, 404),
    );

    await expect(clientFor(fetchMock).getProject(PROJECT)).rejects.toBeInstanceOf(
      InstrumentationNotFoundError,
    );
  });

  it('falls back to a generic message for non-JSON failures', async () => {
    const { fetchMock } = createFetchMock(() => new Response('Bad Gateway', { status: 502 }));

    const error = await clientFor(fetchMock).listDomains().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InstrumentationServerError);
    if (!(error instanceof InstrumentationServerError)) return;
    expect(error.code).toBe('HTTP_502');
    expect(error.message).toBe('Instrumentation API request failed with status 502');
  });

  it('reports a timeout as a server error', async () => {
    const { fetchMock } = createFetchMock(
      (request) =>
        new Promise<Response>((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => {
            reject(new DOMException('The operation was aborted.', 'AbortError'));
          });
        }),
    );

    const error = await clientFor(fetchMock, 10).listDomains().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InstrumentationServerError);
    if (!(error instanceof InstrumentationServerError)) return;
    expect(error.status).toBe(408);
    expect(error.code).toBe('TIMEOUT');
    expect(error.message).toBe('Request timed out after 10ms');
  });

  it('reports a caller abort', async () => {
    const { fetchMock } = createFetchMock(
      (request) =>
        new Promise<Response>((_resolve, reject) => {
          if (request.signal?.aborted) {
            reject(new DOMException('The operation was aborted.', 'AbortError'));
          }
        }),
    );
    const controller = new AbortController();
    controller.abort();

    const error = await clientFor(fetchMock)
      .listMeasurements({ timeseriesId: 'series' }, { signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InstrumentationServerError);
    if (!(error instanceof InstrumentationServerError)) return;
    expect(error.code).toBe('ABORTED');
  });
});
