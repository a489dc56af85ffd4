/**
 * Nextcloud over WebDAV: PROPFIND for listings and existence, GET to
 * download, PUT to upload. Paths are relative to the user's files root.
 */
import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import * as fs from 'fs';
import * as https from 'https';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { HTTP_TIMEOUT_MS, RETRY_POLICY } from '../config.js';
import { ResourceNotFoundError, TransportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { MediaStore, StoredFile } from './types.js';

export interface NextcloudOptions {
  url: string;
  username: string;
  password: string;
  insecureSsl?: boolean;
  /** Download retry policy; RETRY_POLICY when unset. */
  retry?: { maxAttempts: number; baseDelayMs: number };
}

export interface DavEntry {
  /** Decoded path relative to the files root, without a leading slash. */
  path: string;
  isCollection: boolean;
  size: number;
  modifiedAt?: Date;
}

const PROPFIND_BODY =
  '<?xml version="1.0" encoding="utf-8"?>' +
  '<d:propfind xmlns:d="DAV:"><d:prop>' +
  '<d:resourcetype/><d:getcontentlength/><d:getlastmodified/>' +
  '</d:prop></d:propfind>';

// ── Path helpers ──────────────────────────────────────────────────────────────

export function trimSlashes(p: string): string {
  return p.replace(/^\/+|\/+$/g, '');
}

export function encodeDavPath(p: string): string {
  return trimSlashes(p)
    .split('/')
    .filter((s) => s.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

function localName(tag: string): string {
  return tag.slice(tag.indexOf(':') + 1).toLowerCase();
}

/**
 * Parse a 207 Multi-Status body. `rootPath` is the URL path of the files root
 * (e.g. `/remote.php/dav/files/alice`); hrefs are made relative to it.
 * Namespace prefixes vary between servers, so elements are matched by local name.
 */
export function parseMultistatus(xml: string, rootPath: string): DavEntry[] {
  const $ = cheerio.load(xml, { xml: true });
  const root = trimSlashes(decodeURIComponent(rootPath));
  const entries: DavEntry[] = [];

  $<Element, '*'>('*').each((_, response) => {
    if (localName(response.tagName) !== 'response') return;

    const fields = new Map<string, string>();
    let isCollection = false;
    $(response).find('*').each((__, el) => {
      const name = localName(el.tagName);
      if (name === 'collection') isCollection = true;
      else if (!fields.has(name)) fields.set(name, $(el).text().trim());
    });

    const href = fields.get('href');
    if (!href) return;
    let decoded = trimSlashes(decodeURIComponent(href.replace(/^https?:\/\/[^/]+/, '')));
    if (decoded === root) decoded = '';
    else if (decoded.startsWith(`${root}/`)) decoded = decoded.slice(root.length + 1);

    const size = Number(fields.get('getcontentlength') ?? '0');
    const modified = fields.get('getlastmodified');
    entries.push({
      path: decoded,
      isCollection,
      size: Number.isFinite(size) ? size : 0,
      modifiedAt: modified ? new Date(modified) : undefined,
    });
  });

  return entries;
}

// ── Client ────────────────────────────────────────────────────────────────────

export class NextcloudStore implements MediaStore {
  readonly source = 'nextcloud' as const;
  private readonly http: AxiosInstance;
  private readonly rootPath: string;
  private readonly retry: { maxAttempts: number; baseDelayMs: number };

  constructor(opts: NextcloudOptions) {
    this.retry = opts.retry ?? RETRY_POLICY;
    const base = opts.url.replace(/\/+$/, '');
    this.rootPath = `${new URL(base).pathname.replace(/\/+$/, '')}/remote.php/dav/files/${encodeURIComponent(opts.username)}`;
    this.http = axios.create({
      baseURL: `${base}/remote.php/dav/files/${encodeURIComponent(opts.username)}/`,
      auth: { username: opts.username, password: opts.password },
      timeout: HTTP_TIMEOUT_MS,
      httpsAgent: opts.insecureSsl ? new https.Agent({ rejectUnauthorized: false }) : undefined,
    });
  }

  async listFiles(dir: string): Promise<StoredFile[]> {
    const xml = await this.propfind(dir, 1);
    if (xml === null) throw new ResourceNotFoundError([`nextcloud:${dir}`]);
    const self = trimSlashes(dir);
    return parseMultistatus(xml, this.rootPath)
      .filter((e) => !e.isCollection && e.path !== self)
      .map((e) => ({
        path: e.path,
        name: e.path.slice(e.path.lastIndexOf('/') + 1),
        size: e.size,
        modifiedAt: e.modifiedAt,
      }));
  }

  async exists(p: string): Promise<boolean> {
    return (await this.propfind(p, 0)) !== null;
  }

  async fetch(p: string, localPath: string): Promise<void> {
    await withRetry(
      async () => {
        try {
          const res = await this.http.get<Readable>(encodeDavPath(p), { responseType: 'stream' });
          await pipeline(res.data, fs.createWriteStream(localPath));
        } catch (err) {
          throw toStoreError(err, p, 'download');
        }
      },
      { ...this.retry, label: `Nextcloud GET ${p}` },
    );
    logger.debug('Nextcloud: downloaded', { path: p });
  }

  async upload(localPath: string, destPath: string): Promise<void> {
    const { size } = await fs.promises.stat(localPath);
    try {
      await this.http.put(encodeDavPath(destPath), fs.createReadStream(localPath), {
        headers: { 'Content-Type': 'application/octet-stream', 'Content-Length': size },
        maxBodyLength: Infinity,
        timeout: 0,
      });
    } catch (err) {
      throw toStoreError(err, destPath, 'upload');
    }
    logger.info('Nextcloud: uploaded', { path: destPath, bytes: size });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.propfind('', 0)) !== null;
    } catch (err) {
      logger.warn('Nextcloud: ping failed', { error: err });
      return false;
    }
  }

  /** Multi-status body, or null when the path does not exist. */
  private async propfind(p: string, depth: 0 | 1): Promise<string | null> {
    try {
      const res = await this.http.request<string>({
        method: 'PROPFIND',
        url: encodeDavPath(p),
        headers: { Depth: String(depth), 'Content-Type': 'application/xml; charset=utf-8' },
        data: PROPFIND_BODY,
        responseType: 'text',
        validateStatus: (s) => s === 207 || s === 404,
      });
      return res.status === 404 ? null : res.data;
    } catch (err) {
      throw toStoreError(err, p, 'PROPFIND');
    }
  }
}

function toStoreError(err: unknown, p: string, action: string): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 404) return new ResourceNotFoundError([`nextcloud:${p}`], { cause: err });
    return new TransportError(`Nextcloud ${action} failed for ${p}: ${status ?? err.code ?? err.message}`, {
      cause: err,
      status,
      retryable: status === undefined || status >= 500,
    });
  }
  if (err instanceof ResourceNotFoundError || err instanceof TransportError) return err;
  return new TransportError(`Nextcloud ${action} failed for ${p}`, { cause: err, retryable: true });
}
