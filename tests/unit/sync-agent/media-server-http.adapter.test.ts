import test, { afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { MediaServerTarget } from '../../../src/application/sync/ports/media-server.port';
import { AssetFileUnavailableError } from '../../../src/domain/sync/sync-errors';
import type { SyncAgentConfigService } from '../../../src/infrastructure/config/sync-agent-config.service';
import {
  MediaServerHttpAdapter,
  MediaServerRequestError,
} from '../../../src/infrastructure/http/media-server-http.adapter';
import { candidate } from './support';

interface RecordedRequest {
  url: string;
  method?: string;
  headers: Headers;
  body?: RequestInit['body'];
}

const target: MediaServerTarget = { baseUrl: 'http://primary.test', apiKey: 'test-api-key' };

function createAdapter(): MediaServerHttpAdapter {
  const config = {
    probeTimeoutMs: 2000,
    metadataTimeoutMs: 10_000,
    uploadTimeoutMs: 60_000,
  } as SyncAgentConfigService;
  return new MediaServerHttpAdapter(config);
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

afterEach(() => {
  mock.restoreAll();
});

function mockFetch(
  respond: (request: RecordedRequest) => Response,
): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    requests.push(request);
    return respond(request);
  });
  return requests;
}

test('MediaServerHttpAdapter.probe reports a 200 ping as reachable', async () => {
  const requests = mockFetch(() => jsonResponse(200, { res: 'pong' }));

  const result = await createAdapter().probe('http://primary.test');

  assert.deepEqual(result, { reachable: true, statusCode: 200 });
  assert.equal(requests[0]?.url, 'http://primary.test/api/server/ping');
  assert.equal(requests[0]?.method, 'GET');
});

test('MediaServerHttpAdapter.probe reports other statuses and timeouts as unreachable', async () => {
  let call = 0;
  mock.method(globalThis, 'fetch', async (): Promise<Response> => {
    call += 1;
    if (call === 1) {
      return jsonResponse(503, {});
    }
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    throw timeout;
  });
  const adapter = createAdapter();

  assert.deepEqual(await adapter.probe('http://primary.test'), {
    reachable: false,
    statusCode: 503,
    detail: 'ping answered with status 503',
  });
  assert.deepEqual(await adapter.probe('http://primary.test'), {
    reachable: false,
    detail: 'request timed out',
  });
});

test('MediaServerHttpAdapter.listAlbums authenticates and drops malformed entries', async () => {
  const requests = mockFetch(() =>
    jsonResponse(200, [
      { id: 'album-1', albumName: 'Screenshots', assetCount: 3 },
      { id: 42, albumName: 'Broken' },
      { albumName: 'No id' },
    ]),
  );

  const albums = await createAdapter().listAlbums(target);

  assert.deepEqual(albums, [{ id: 'album-1', albumName: 'Screenshots' }]);
  assert.equal(requests[0]?.url, 'http://primary.test/api/albums');
  assert.equal(requests[0]?.headers.get('x-api-key'), 'test-api-key');
  assert.equal(requests[0]?.headers.get('accept'), 'application/json');
});

test('MediaServerHttpAdapter.listAlbums raises a request error carrying the server message', async () => {
  mockFetch(() => jsonResponse(401, { message: 'Invalid API key', statusCode: 401 }));

  await assert.rejects(
    createAdapter().listAlbums(target),
    (error: unknown) =>
      error instanceof MediaServerRequestError &&
      error.statusCode === 401 &&
      error.message === 'GET /api/albums failed with status 401 (Invalid API key).' &&
      error.responseBody === '{"message":"Invalid API key","statusCode":401}',
  );
});

test('MediaServerHttpAdapter falls back to the raw body text, or none, in request errors', async () => {
  let call = 0;
  mockFetch(() => {
    call += 1;
    return call === 1
      ? new Response('upstream down\n', { status: 502 })
      : new Response(null, { status: 500 });
  });
  const adapter = createAdapter();

  await assert.rejects(adapter.listAlbums(target), {
    message: 'GET /api/albums failed with status 502 (upstream down).',
  });
  await assert.rejects(adapter.listAlbums(target), {
    message: 'GET /api/albums failed with status 500.',
  });
});

test('MediaServerHttpAdapter.addAssetsToAlbum sends the ids and maps per-asset results', async () => {
  const requests = mockFetch(() =>
    jsonResponse(200, [
      { id: 'asset-1', success: true },
      { id: 'asset-2', success: false, error: 'duplicate' },
    ]),
  );

  const results = await createAdapter().addAssetsToAlbum(target, 'album 1', ['asset-1', 'asset-2']);

  assert.deepEqual(results, [
    { id: 'asset-1', success: true, error: undefined },
    { id: 'asset-2', success: false, error: 'duplicate' },
  ]);
  assert.equal(requests[0]?.url, 'http://primary.test/api/albums/album%201/assets');
  assert.equal(requests[0]?.method, 'PUT');
  assert.equal(requests[0]?.headers.get('content-type'), 'application/json');
  assert.equal(requests[0]?.body, '{"ids":["asset-1","asset-2"]}');
});

test('MediaServerHttpAdapter.uploadAsset posts the file as multipart form data', async (t) => {
  const directory = await mkdtemp(path.join(tmpdir(), 'media-upload-'));
  t.after(() => rm(directory, { recursive: true, force: true }));
  const filePath = path.join(directory, 'a.png');
  await writeFile(filePath, 'png-bytes');
  const requests = mockFetch(() => jsonResponse(201, { id: 'asset-1', status: 'created' }));

  const response = await createAdapter().uploadAsset(target, {
    file: { ...candidate('a.png', 1000, 9), path: filePath },
    fields: {
      deviceAssetId: 'a.png-9-1',
      deviceId: 'test-device',
      fileCreatedAt: '1970-01-01T00:00:01.000Z',
      fileModifiedAt: '1970-01-01T00:00:01.000Z',
      isFavorite: false,
    },
  });

  assert.deepEqual(response, { statusCode: 201, body: { id: 'asset-1', status: 'created' } });
  assert.equal(requests[0]?.url, 'http://primary.test/api/assets');
  assert.equal(requests[0]?.method, 'POST');
  assert.equal(requests[0]?.headers.get('x-api-key'), 'test-api-key');

  const form = requests[0]?.body;
  assert.ok(form instanceof FormData);
  assert.equal(form.get('deviceAssetId'), 'a.png-9-1');
  assert.equal(form.get('deviceId'), 'test-device');
  assert.equal(form.get('fileCreatedAt'), '1970-01-01T00:00:01.000Z');
  assert.equal(form.get('fileModifiedAt'), '1970-01-01T00:00:01.000Z');
  assert.equal(form.get('isFavorite'), 'false');

  const assetData = form.get('assetData');
  assert.ok(assetData !== null && typeof assetData !== 'string');
  assert.equal(assetData.name, 'a.png');
  assert.equal(await assetData.text(), 'png-bytes');
});

test('MediaServerHttpAdapter.uploadAsset raises AssetFileUnavailableError for a missing file', async () => {
  const requests = mockFetch(() => jsonResponse(201, { id: 'asset-1' }));
  const missing = path.join(tmpdir(), 'does-not-exist', 'gone.png');

  await assert.rejects(
    createAdapter().uploadAsset(target, {
      file: { ...candidate('gone.png', 1000), path: missing },
      fields: {
        deviceAssetId: 'gone.png-10-1',
        deviceId: 'test-device',
        fileCreatedAt: '1970-01-01T00:00:01.000Z',
        fileModifiedAt: '1970-01-01T00:00:01.000Z',
        isFavorite: false,
      },
    }),
    (error: unknown) => error instanceof AssetFileUnavailableError && error.filePath === missing,
  );
  assert.equal(requests.length, 0);
});

async function countOpenDescriptors(): Promise<number> {
  return (await readdir('/proc/self/fd')).length;
}

test(
  'MediaServerHttpAdapter.uploadAsset closes the file when the request fails in transit',
  { skip: process.platform !== 'linux' },
  async (t) => {
    const directory = await mkdtemp(path.join(tmpdir(), 'media-upload-'));
    t.after(() => rm(directory, { recursive: true, force: true }));
    const filePath = path.join(directory, 'a.png');
    await writeFile(filePath, 'png-bytes');
    mock.method(globalThis, 'fetch', async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const adapter = createAdapter();
    const before = await countOpenDescriptors();

    await assert.rejects(
      adapter.uploadAsset(target, {
        file: { ...candidate('a.png', 1000, 9), path: filePath },
        fields: {
          deviceAssetId: 'a.png-9-1',
          deviceId: 'test-device',
          fileCreatedAt: '1970-01-01T00:00:01.000Z',
          fileModifiedAt: '1970-01-01T00:00:01.000Z',
          isFavorite: false,
        },
      }),
      (error: unknown) =>
        error instanceof MediaServerRequestError &&
        error.statusCode === undefined &&
        error.message === 'Unable to reach media server for upload (fetch failed).',
    );
    assert.equal(await countOpenDescriptors(), before);
  },
);
