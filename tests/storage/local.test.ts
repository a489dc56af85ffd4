import * as fs from 'fs';
import * as path from 'path';
import { LocalStore } from '../../src/storage/local.js';
import { ResourceNotFoundError } from '../../src/utils/errors.js';
import { makeTempDir } from '../helpers.js';

describe('LocalStore', () => {
  let dir: string;
  let store: LocalStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    await fs.promises.mkdir(path.join(dir, 'images', 'nested'), { recursive: true });
    await fs.promises.writeFile(path.join(dir, 'images', '2.jpg'), 'two');
    await fs.promises.writeFile(path.join(dir, 'images', '1.png'), 'one!');
    store = new LocalStore(dir);
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('lists the files directly inside a folder', async () => {
    const files = await store.listFiles('images');
    expect(files.map((f) => [f.name, f.size]).sort()).toEqual([['1.png', 4], ['2.jpg', 3]]);
    expect(files.find((f) => f.name === '2.jpg')?.path).toBe(path.join(dir, 'images', '2.jpg'));
  });

  it('reports a missing folder as a missing resource', async () => {
    await expect(store.listFiles('nope')).rejects.toMatchObject({
      name: 'ResourceNotFoundError',
      message: 'Missing resources: local:nope',
      missing: ['local:nope'],
    });
  });

  it('checks existence relative to the base folder', async () => {
    expect(await store.exists('images/2.jpg')).toBe(true);
    expect(await store.exists('images/3.jpg')).toBe(false);
    expect(await store.ping()).toBe(true);
  });

  it('copies files in and out', async () => {
    const copy = path.join(dir, 'copy.jpg');
    await store.fetch('images/2.jpg', copy);
    expect(await fs.promises.readFile(copy, 'utf-8')).toBe('two');

    await store.upload(copy, 'images/nested/out.jpg');
    expect(await fs.promises.readFile(path.join(dir, 'images', 'nested', 'out.jpg'), 'utf-8')).toBe('two');
  });

  it('names the missing folder when an upload has nowhere to go', async () => {
    const copy = path.join(dir, 'images', '2.jpg');
    await expect(store.upload(copy, 'missing/out.mp4')).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(store.upload(copy, 'missing/out.mp4')).rejects.toMatchObject({ missing: ['local:missing'] });
  });
});
