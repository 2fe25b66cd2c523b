/**
 * Directory Handler Tests
 * Request path mapping, root confinement and failure statuses
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Hono } from 'hono';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createStaticRegistry, nodeFileSystem, type ContentFileSystem } from '@servefs/content';
import { dirHandler } from '../../handlers/directory';

describe('dirHandler', () => {
  let baseDir: string;
  let root: string;
  const registry = createStaticRegistry({ '.html': 'text/html', '.css': 'text/css' });

  beforeAll(async () => {
    baseDir = await fs.mkdtemp(join(tmpdir(), 'servefs-dir-handler-test-'));
    root = join(baseDir, 'public');
    await fs.mkdir(join(root, 'css'), { recursive: true });
    await fs.writeFile(join(root, 'index.html'), '<h1>home</h1>');
    await fs.writeFile(join(root, 'css', 'site.css'), 'body { margin: 0; }');
    await fs.writeFile(join(root, 'hello world.txt'), 'spaced');
    await fs.writeFile(join(root, 'blob.bin'), Buffer.from([1, 2, 3, 4]));
    await fs.writeFile(join(baseDir, 'secret.txt'), 'top secret');
  });

  afterAll(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  function rootApp(fileSystem?: ContentFileSystem): Hono {
    const app = new Hono();
    app.get('/*', dirHandler(root, {}, { registry, fileSystem }));
    return app;
  }

  it('should serve a file beneath the root with its exact bytes', async () => {
    const res = await rootApp().request('/index.html');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toBe('<h1>home</h1>');
  });

  it('should serve nested files', async () => {
    const res = await rootApp().request('/css/site.css');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/css; charset=utf-8');
    expect(await res.text()).toBe('body { margin: 0; }');
  });

  it('should fall back to application/octet-stream for unknown extensions', async () => {
    const res = await rootApp().request('/blob.bin');

    expect(res.headers.get('Content-Type')).toBe('application/octet-stream');
    expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([1, 2, 3, 4]));
  });

  it('should decode percent-encoded names', async () => {
    const res = await rootApp().request('/hello%20world.txt');

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('spaced');
  });

  it('should reject encoded traversal with 403 and no file contents', async () => {
    const res = await rootApp().request('/..%2f..%2fsecret.txt');

    expect(res.status).toBe(403);
    expect(await res.text()).toBe('Forbidden');
  });

  it('should reject encoded backslash traversal with 403', async () => {
    const res = await rootApp().request('/..%5csecret.txt');

    expect(res.status).toBe(403);
  });

  it('should reject NUL bytes with 403', async () => {
    const res = await rootApp().request('/index.html%00.png');

    expect(res.status).toBe(403);
  });

  it('should return 404 for a missing file', async () => {
    const res = await rootApp().request('/missing.html');

    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Not Found');
  });

  it('should return 404 for a directory', async () => {
    expect((await rootApp().request('/css')).status).toBe(404);
    expect((await rootApp().request('/')).status).toBe(404);
  });

  it('should return 400 for malformed percent-encoding', async () => {
    const res = await rootApp().request('/%E0%A4%A');

    expect(res.status).toBe(400);
  });

  it('should return 500 when a file exists but cannot be read', async () => {
    const lockedFs: ContentFileSystem = {
      ...nodeFileSystem,
      readFile: () => Promise.reject(Object.assign(new Error('permission denied'), { code: 'EACCES' })),
    };

    const res = await rootApp(lockedFs).request('/index.html');

    expect(res.status).toBe(500);
    expect(await res.text()).toBe('Internal Server Error');
  });

  describe('strippedPrefix', () => {
    function prefixedApp(): Hono {
      const app = new Hono();
      app.get('/static/*', dirHandler(root, { strippedPrefix: '/static/' }, { registry }));
      return app;
    }

    it('should remove the prefix before mapping', async () => {
      const res = await prefixedApp().request('/static/css/site.css');

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('body { margin: 0; }');
    });

    it('should not serve names that only share the prefix text', async () => {
      const app = new Hono();
      app.get('/*', dirHandler(root, { strippedPrefix: '/static' }, { registry }));

      expect((await app.request('/staticindex.html')).status).toBe(404);
    });

    it('should still confine prefixed requests', async () => {
      const res = await prefixedApp().request('/static/..%2f..%2fsecret.txt');

      expect(res.status).toBe(403);
    });
  });
});
