import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Hono } from 'hono';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createStaticRegistry } from '@servefs/content';
import { NotFoundError } from '@servefs/utils';
import { faviconHandler, sendFileHandler } from '../../handlers/file';

describe('fixed file handlers', () => {
  let testDir: string;
  const iconBytes = new Uint8Array([0, 0, 1, 0, 1, 0, 16, 16]);
  const zipBytes = new Uint8Array([0x50, 0x4b, 0x05, 0x06, 0, 0, 0, 0]);

  beforeAll(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'servefs-file-handler-test-'));
    await fs.writeFile(join(testDir, 'favicon.ico'), iconBytes);
    await fs.writeFile(join(testDir, 'first.zip'), zipBytes);
    await fs.writeFile(join(testDir, '报告.pdf'), '%PDF-1.4');
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('faviconHandler', () => {
    it('should serve the icon inline for any requested path', async () => {
      const app = new Hono();
      app.get('/*', faviconHandler(join(testDir, 'favicon.ico'), { registry: createStaticRegistry({}) }));

      for (const requestPath of ['/favicon.ico', '/anything/else.png']) {
        const res = await app.request(requestPath);

        expect(res.status).toBe(200);
        expect(res.headers.get('Content-Type')).toBe('image/x-icon');
        expect(res.headers.get('Content-Disposition')).toBeNull();
        expect(new Uint8Array(await res.arrayBuffer())).toEqual(iconBytes);
      }
    });

    it('should prefer the registry type over the fallback table', async () => {
      const app = new Hono();
      const registry = createStaticRegistry({ '.ico': 'image/vnd.microsoft.icon' });
      app.get('/favicon.ico', faviconHandler(join(testDir, 'favicon.ico'), { registry }));

      const res = await app.request('/favicon.ico');

      expect(res.headers.get('Content-Type')).toBe('image/vnd.microsoft.icon');
    });

    it('should return 404 when the icon is missing', async () => {
      const app = new Hono();
      app.get('/favicon.ico', faviconHandler(join(testDir, 'missing.ico')));

      const res = await app.request('/favicon.ico');

      expect(res.status).toBe(404);
      expect(await res.text()).toBe('Not Found');
    });

    it('should reject an empty path when constructed', () => {
      expect(() => faviconHandler('')).toThrow(NotFoundError);
    });
  });

  describe('sendFileHandler', () => {
    it('should serve the file as an attachment named after its base name', async () => {
      const app = new Hono();
      app.get('/download', sendFileHandler(join(testDir, 'first.zip')));

      const res = await app.request('/download');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('application/zip');
      expect(res.headers.get('Content-Disposition')).toBe('attachment;filename=first.zip');
      expect(res.headers.get('Content-Length')).toBe('8');
      expect(new Uint8Array(await res.arrayBuffer())).toEqual(zipBytes);
    });

    it('should encode non-ASCII base names in Content-Disposition', async () => {
      const app = new Hono();
      app.get('/download', sendFileHandler(join(testDir, '报告.pdf')));

      const res = await app.request('/download');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('application/pdf');
      expect(res.headers.get('Content-Disposition')).toBe(
        "attachment;filename=__.pdf;filename*=UTF-8''%E6%8A%A5%E5%91%8A.pdf"
      );
      expect(await res.text()).toBe('%PDF-1.4');
    });

    it('should return 404 when the file is missing', async () => {
      const app = new Hono();
      app.get('/download', sendFileHandler(join(testDir, 'gone.zip')));

      expect((await app.request('/download')).status).toBe(404);
    });

    it('should return 404 when the path is a directory', async () => {
      const app = new Hono();
      app.get('/download', sendFileHandler(testDir));

      expect((await app.request('/download')).status).toBe(404);
    });

    it('should reject an empty path when constructed', () => {
      expect(() => sendFileHandler('')).toThrow(NotFoundError);
    });
  });
});
