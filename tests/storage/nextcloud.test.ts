import * as fs from 'fs';
import * as path from 'path';
import nock from 'nock';
import { NextcloudStore, encodeDavPath, parseMultistatus, trimSlashes } from '../../src/storage/nextcloud.js';
import { ResourceNotFoundError, TransportError } from '../../src/utils/errors.js';
import { makeTempDir } from '../helpers.js';

const ROOT = '/remote.php/dav/files/alice';

const listing = `<?xml version="1.0"?>
<d:multistatus xmlns:d="DAV:" xmlns:oc="http://owncloud.org/ns">
  <d:response>
    <d:href>/remote.php/dav/files/alice/Photos/My%20Album/</d:href>
    <d:propstat>
      <d:prop>
        <d:resourcetype><d:collection/></d:resourcetype>
        <d:getlastmodified>Tue, 06 Jan 2026 10:00:00 GMT</d:getlastmodified>
      </d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/remote.php/dav/files/alice/Photos/My%20Album/01%20beach.jpg</d:href>
    <d:propstat>
      <d:prop>
        <d:resourcetype/>
        <d:getcontentlength>1234</d:getcontentlength>
        <d:getlastmodified>Wed, 07 Jan 2026 08:30:00 GMT</d:getlastmodified>
      </d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`;

describe('parseMultistatus', () => {
  it('decodes hrefs relative to the files root', () => {
    expect(parseMultistatus(listing, ROOT)).toEqual([
      {
        path: 'Photos/My Album',
        isCollection: true,
        size: 0,
        modifiedAt: new Date('2026-01-06T10:00:00Z'),
      },
      {
        path: 'Photos/My Album/01 beach.jpg',
        isCollection: false,
        size: 1234,
        modifiedAt: new Date('2026-01-07T08:30:00Z'),
      },
    ]);
  });

  it('accepts other namespace prefixes and absolute hrefs', () => {
    const xml = `<?xml version="1.0"?>
<D:multistatus xmlns:D="DAV:">
  <D:response>
    <D:href>https://cloud.example.org/remote.php/dav/files/alice/</D:href>
    <D:propstat><D:prop><D:resourcetype><D:collection/></D:resourcetype></D:prop></D:propstat>
  </D:response>
  <D:response>
    <D:href>https://cloud.example.org/remote.php/dav/files/alice/music/song.mp3</D:href>
    <D:propstat><D:prop><D:getcontentlength>99</D:getcontentlength></D:prop></D:propstat>
  </D:response>
</D:multistatus>`;

    expect(parseMultistatus(xml, ROOT).map((e) => [e.path, e.isCollection, e.size])).toEqual([
      ['', true, 0],
      ['music/song.mp3', false, 99],
    ]);
  });

  it('skips responses without an href', () => {
    const xml = '<d:multistatus xmlns:d="DAV:"><d:response><d:status>HTTP/1.1 404</d:status></d:response></d:multistatus>';
    expect(parseMultistatus(xml, ROOT)).toEqual([]);
  });
});

describe('path helpers', () => {
  it('encodes each segment and drops empty ones', () => {
    expect(encodeDavPath('/Photos/My Album/')).toBe('Photos/My%20Album');
    expect(encodeDavPath('a//b#1.jpg')).toBe('a/b%231.jpg');
    expect(encodeDavPath('')).toBe('');
  });

  it('trims leading and trailing slashes', () => {
    expect(trimSlashes('//Videos/out/')).toBe('Videos/out');
  });
});

describe('NextcloudStore', () => {
  const BASE = 'https://cloud.example.org';
  let dir: string;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    nock.cleanAll();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function store() {
    return new NextcloudStore({
      url: `${BASE}/`,
      username: 'alice',
      password: 'test-password',
      retry: { maxAttempts: 2, baseDelayMs: 1 },
    });
  }

  function dav() {
    return nock(BASE).matchHeader('authorization', `Basic ${Buffer.from('alice:test-password').toString('base64')}`);
  }

  it('lists the files of a folder with a depth-1 PROPFIND', async () => {
    const scope = dav()
      .intercept(`${ROOT}/Photos/My%20Album`, 'PROPFIND')
      .matchHeader('depth', '1')
      .reply(207, listing, { 'Content-Type': 'application/xml' });

    expect(await store().listFiles('Photos/My Album/')).toEqual([
      {
        path: 'Photos/My Album/01 beach.jpg',
        name: '01 beach.jpg',
        size: 1234,
        modifiedAt: new Date('2026-01-07T08:30:00Z'),
      },
    ]);
    scope.done();
  });

  it('reports a missing folder as a missing resource', async () => {
    dav().intercept(`${ROOT}/Photos/Gone`, 'PROPFIND').reply(404);
    await expect(store().listFiles('Photos/Gone')).rejects.toEqual(new ResourceNotFoundError(['nextcloud:Photos/Gone']));
  });

  it('checks existence with a depth-0 PROPFIND', async () => {
    dav().intercept(`${ROOT}/Videos`, 'PROPFIND').matchHeader('depth', '0').reply(207, listing);
    dav().intercept(`${ROOT}/Archive`, 'PROPFIND').matchHeader('depth', '0').reply(404);

    const nc = store();
    expect(await nc.exists('Videos')).toBe(true);
    expect(await nc.exists('Archive')).toBe(false);
  });

  it('pings the files root and reports refusals as unreachable', async () => {
    dav().intercept(`${ROOT}/`, 'PROPFIND').reply(207, listing);
    expect(await store().ping()).toBe(true);

    nock(BASE).intercept(`${ROOT}/`, 'PROPFIND').reply(401);
    expect(await store().ping()).toBe(false);
  });

  it('retries a download after a server error', async () => {
    const scope = dav()
      .get(`${ROOT}/Photos/1.jpg`).reply(503)
      .get(`${ROOT}/Photos/1.jpg`).reply(200, 'jpeg-bytes');
    const target = path.join(dir, '1.jpg');

    await store().fetch('Photos/1.jpg', target);

    expect(fs.readFileSync(target, 'utf-8')).toBe('jpeg-bytes');
    scope.done();
  });

  it('gives up with a retryable TransportError once attempts run out', async () => {
    const scope = dav().get(`${ROOT}/Photos/1.jpg`).times(2).reply(500);

    const err = await store().fetch('Photos/1.jpg', path.join(dir, '1.jpg')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: 'Nextcloud download failed for Photos/1.jpg: 500', status: 500, retryable: true });
    scope.done();
  });

  it('does not retry a missing download', async () => {
    const scope = dav().get(`${ROOT}/Photos/gone.jpg`).reply(404);

    await expect(store().fetch('Photos/gone.jpg', path.join(dir, 'gone.jpg')))
      .rejects.toMatchObject({ name: 'ResourceNotFoundError', missing: ['nextcloud:Photos/gone.jpg'] });
    scope.done();
  });

  it('uploads the file body with PUT', async () => {
    const source = path.join(dir, 'slideshow.mp4');
    await fs.promises.writeFile(source, 'rendered-video', 'utf-8');
    const scope = dav()
      .put(`${ROOT}/Videos/weekly%20show.mp4`, 'rendered-video')
      .reply(201);

    await store().upload(source, 'Videos/weekly show.mp4');
    scope.done();
  });

  it('fails an upload into a missing folder with a non-retryable error', async () => {
    const source = path.join(dir, 'slideshow.mp4');
    await fs.promises.writeFile(source, 'rendered-video', 'utf-8');
    dav().put(`${ROOT}/Nope/out.mp4`).reply(409);

    await expect(store().upload(source, 'Nope/out.mp4'))
      .rejects.toMatchObject({ name: 'TransportError', status: 409, retryable: false });
  });
});
