import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { StatusError, ValidationError, createAxiosTransport } from '@restlift/core';
import type { ActionListener, Logger } from '@restlift/core';
import { DocumentsClient, GetRequest } from '../index.js';
import type { GetResponse } from '../index.js';

const BASE_URL = 'http://search.test';
const JSON_HEADERS = { 'Content-Type': 'application/json' };
const NOT_FOUND_DOC = '{"_index":"posts","_type":"_all","_id":"9","found":false}';

function createClient(logger?: Logger): DocumentsClient {
  return new DocumentsClient({ transport: createAxiosTransport({ baseUrl: BASE_URL, debug: false }), logger });
}

/**
 * Resolve with whichever callback the listener receives first
 */
function listen<T>(run: (listener: ActionListener<T>) => void): Promise<{ value: T } | { error: unknown }> {
  return new Promise((resolve) => {
    run({
      onResponse: (value) => resolve({ value }),
      onFailure: (error) => resolve({ error }),
    });
  });
}

describe('DocumentsClient', () => {
  beforeAll(() => nock.disableNetConnect());
  afterAll(() => nock.enableNetConnect());
  afterEach(() => nock.cleanAll());

  describe('ping', () => {
    it('is true when the cluster answers 200', async () => {
      nock(BASE_URL).head('/').reply(200);
      await expect(createClient().ping()).resolves.toBe(true);
    });

    it('forwards per-call headers', async () => {
      nock(BASE_URL).matchHeader('x-opaque-id', 'trace-1').head('/').reply(200);
      await expect(createClient().ping({ 'X-Opaque-Id': 'trace-1' })).resolves.toBe(true);
    });

    it('rejects with a status error when the cluster is unavailable', async () => {
      nock(BASE_URL).head('/').reply(503);
      await expect(createClient().ping()).rejects.toMatchObject({
        status: { code: 503, name: 'SERVICE_UNAVAILABLE' },
      });
    });
  });

  describe('exists', () => {
    it('is true for an existing document', async () => {
      nock(BASE_URL).head('/posts/_all/1').reply(200);
      await expect(createClient().exists(new GetRequest({ index: 'posts', id: '1' }))).resolves.toBe(true);
    });

    it('is false for a missing document', async () => {
      nock(BASE_URL).head('/posts/_all/9').reply(404);
      await expect(createClient().exists(new GetRequest({ index: 'posts', id: '9' }))).resolves.toBe(false);
    });

    it('sends the query parameters', async () => {
      nock(BASE_URL).head('/posts/_all/1').query({ routing: 'r1', realtime: 'false' }).reply(200);
      const request = new GetRequest({ index: 'posts', id: '1', routing: 'r1', realtime: false });
      await expect(createClient().exists(request)).resolves.toBe(true);
    });

    it('delivers the answer to a listener', async () => {
      nock(BASE_URL).head('/posts/_all/1').reply(200);
      const outcome = await listen<boolean>((listener) =>
        createClient().existsAsync(new GetRequest({ index: 'posts', id: '1' }), listener)
      );
      expect(outcome).toEqual({ value: true });
    });
  });

  describe('get', () => {
    it('returns a found document', async () => {
      nock(BASE_URL)
        .get('/posts/_all/1')
        .reply(200, '{"_index":"posts","_type":"doc","_id":"1","_version":1,"found":true,"_source":{"title":"hello"}}', JSON_HEADERS);

      await expect(createClient().get(new GetRequest({ index: 'posts', id: '1' }))).resolves.toEqual({
        index: 'posts',
        type: 'doc',
        id: '1',
        version: 1,
        found: true,
        source: { title: 'hello' },
        fields: {},
      });
    });

    it('returns the not-found document for a missing id', async () => {
      nock(BASE_URL).get('/posts/_all/9').reply(404, NOT_FOUND_DOC, JSON_HEADERS);

      const response = await createClient().get(new GetRequest({ index: 'posts', id: '9' }));
      expect(response.found).toBe(false);
      expect(response.id).toBe('9');
    });

    it('rejects with the server error when the index is missing', async () => {
      nock(BASE_URL)
        .get('/logs/_all/1')
        .reply(
          404,
          '{"error":{"type":"index_not_found_exception","reason":"no such index [logs]","index":"logs"},"status":404}',
          JSON_HEADERS
        );

      const error = await createClient()
        .get(new GetRequest({ index: 'logs', id: '1' }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StatusError);
      expect(error).toMatchObject({
        message: 'Server exception [type=index_not_found_exception, reason=no such index [logs]]',
        status: { code: 404, name: 'NOT_FOUND' },
        metadata: { index: 'logs' },
      });
    });

    it('reports an unparseable server error with its status', async () => {
      nock(BASE_URL).get('/posts/_all/1').reply(500, '<html>oops</html>', { 'Content-Type': 'text/html' });

      const error = await createClient()
        .get(new GetRequest({ index: 'posts', id: '1' }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StatusError);
      expect(error).toMatchObject({
        message: 'Unable to parse response body',
        status: { code: 500, name: 'INTERNAL_SERVER_ERROR' },
      });
    });

    it('fails validation without sending anything', async () => {
      const scope = nock(BASE_URL).get(/.*/).reply(200);

      await expect(createClient().get(new GetRequest({ index: 'posts' }))).rejects.toBeInstanceOf(ValidationError);
      expect(scope.isDone()).toBe(false);
    });

    it('logs the document being read', async () => {
      nock(BASE_URL).get('/posts/_all/9').reply(404, NOT_FOUND_DOC, JSON_HEADERS);
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

      await createClient(logger).get(new GetRequest({ index: 'posts', id: '9' }));

      expect(logger.debug).toHaveBeenCalledWith('Getting document', { index: 'posts', type: '_all', id: '9' });
    });

    it('delivers a missing document to a listener', async () => {
      nock(BASE_URL).get('/posts/_all/9').reply(404, NOT_FOUND_DOC, JSON_HEADERS);

      const outcome = await listen<GetResponse>((listener) =>
        createClient().getAsync(new GetRequest({ index: 'posts', id: '9' }), listener)
      );

      expect(outcome).toEqual({ value: { index: 'posts', type: '_all', id: '9', found: false, fields: {} } });
    });

    it('delivers validation failures to a listener', async () => {
      const outcome = await listen<GetResponse>((listener) =>
        createClient().getAsync(new GetRequest({ id: '1' }), listener)
      );

      expect(outcome).toMatchObject({ error: { validationErrors: ['index is missing'] } });
    });
  });
});
