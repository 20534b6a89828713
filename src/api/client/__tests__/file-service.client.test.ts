/**
 * File Service Client Unit Tests
 */

import { Readable } from 'stream';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  artifactAreaFor,
  encodeFilePath,
  FileServiceClient,
  workloadArchiveFor
} from '../file-service.client.js';
import { ApiErrorCode } from '@/api/middleware/error.handler.js';
import { TenantResolver } from '@/tenancy/tenant.resolver.js';
import { chunkedBody, createFakeUpstream, FakeHandler, json, readAll } from './fake-upstream.js';

function createClient(handler: FakeHandler, timeoutMs: number = 30000) {
  const upstream = createFakeUpstream(handler);
  const client = new FileServiceClient(
    {
      timeoutMs,
      retry: { maxRetries: 1, baseDelayMs: 1 },
      resolver: new TenantResolver({
        urlTemplate: 'https://files.{tenant}.example.test',
        overrides: { beta: 'http://localhost:9000/' }
      })
    },
    upstream.provider
  );
  return { client, upstream };
}

function streamReply(body: Readable, headers: Record<string, string> = {}) {
  return { status: 200, data: body, headers };
}

describe('FileServiceClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('artifactAreaFor', () => {
    it.each([
      ['ISIM', 'isim'],
      ['NovaCoho', 'coho'],
      ['IWPS', 'iwps'],
      ['WorkloadJob', 'workloadjob'],
      ['WorkloadJobROI', 'workloadjobroi'],
      ['Coho', 'iwps'],
      ['Custom', 'iwps']
    ])('should map %s to %s', (jobType, area) => {
      expect(artifactAreaFor(jobType)).toBe(area);
    });

    it('should default a missing type to iwps', () => {
      expect(artifactAreaFor(null)).toBe('iwps');
      expect(artifactAreaFor(undefined)).toBe('iwps');
    });
  });

  describe('workloadArchiveFor', () => {
    it('should pick the archive named in the filename', () => {
      expect(workloadArchiveFor('simics.log')).toBe('simics');
      expect(workloadArchiveFor('serialconsole.zip')).toBe('serialconsole');
      expect(workloadArchiveFor('simics-serialconsole.txt')).toBe('serialconsole');
      expect(workloadArchiveFor('report.txt')).toBeNull();
    });
  });

  describe('encodeFilePath', () => {
    it('should encode each segment and keep the separators', () => {
      expect(encodeFilePath('logs/run 1/out#2.txt')).toBe('logs/run%201/out%232.txt');
    });

    it('should drop empty segments', () => {
      expect(encodeFilePath('/logs//a.txt')).toBe('logs/a.txt');
    });

    it.each(['../secret', 'logs/../../etc', './a.txt', '', '///'])('should reject %p', (filename) => {
      expect(() => encodeFilePath(filename)).toThrow(`Invalid filename '${filename}'`);
    });
  });

  describe('listFiles', () => {
    it('should list the artifact directory on the tenant host', async () => {
      const { client, upstream } = createClient(() => json(200, { files: ['a.log', { name: 'b.bin' }] }));

      const files = await client.listFiles('acme', 'J1', 'test-secret', { jobType: 'ISIM' });

      expect(files).toEqual(['a.log', 'b.bin']);
      expect(upstream.calls[0].url).toBe('https://files.acme.example.test/fs/files/J1/isim/artifacts/out');
      expect(upstream.calls[0].headers.authorization).toBe('Bearer test-secret');
    });

    it('should list workload logs from their own directory', async () => {
      const { client, upstream } = createClient(() => json(200, { children: ['simics', 'serialconsole'] }));

      const files = await client.listFiles('acme', 'J2', 'test-secret', { jobType: 'WorkloadJobROI' });

      expect(files).toEqual(['simics', 'serialconsole']);
      expect(upstream.calls[0].url).toBe('https://files.acme.example.test/fs/files/J2/logs');
    });

    it('should use a configured tenant override instead of the template', async () => {
      const { client, upstream } = createClient(() => json(200, { files: [] }));

      await client.listFiles('beta', 'J1', 'test-secret');

      expect(upstream.calls[0].url).toBe('http://localhost:9000/fs/files/J1/iwps/artifacts/out');
    });

    it('should return an empty list when the listing has no files key', async () => {
      const { client } = createClient(() => json(200, {}));

      expect(await client.listFiles('acme', 'J1', 'test-secret')).toEqual([]);
    });

    it('should fail when files is not a list', async () => {
      const { client } = createClient(() => json(200, { files: 'a.log' }));

      await expect(client.listFiles('acme', 'J1', 'test-secret')).rejects.toMatchObject({
        code: ApiErrorCode.UPSTREAM_ERROR,
        details: { job_id: 'J1' }
      });
    });

    it('should report a missing artifact directory as NOT_FOUND', async () => {
      const { client } = createClient(() => json(404, {}));

      await expect(client.listFiles('acme', 'J1', 'test-secret')).rejects.toMatchObject({
        code: ApiErrorCode.NOT_FOUND,
        message: "No artifacts found for job 'J1'"
      });
    });

    it.each([null, undefined, '', 'bad tenant', 'a.b'])(
      'should reject tenant %p without calling the file service',
      async (tenantId) => {
        const { client, upstream } = createClient(() => json(200, { files: [] }));

        await expect(client.listFiles(tenantId, 'J1', 'test-secret')).rejects.toMatchObject({
          code: ApiErrorCode.INVALID_TENANT
        });
        expect(upstream.calls).toHaveLength(0);
      }
    );
  });

  describe('downloadFile', () => {
    it('should stream the file bytes with the upstream headers', async () => {
      const { client, upstream } = createClient(() => streamReply(
        chunkedBody(['hello ', 'world']),
        { 'content-type': 'text/plain', 'content-length': '11' }
      ));

      const download = await client.downloadFile('acme', 'J1', 'logs/run 1.txt', 'test-secret', { jobType: 'IWPS' });

      expect(upstream.calls[0].url).toBe('https://files.acme.example.test/fs/files/J1/iwps/artifacts/out/logs/run%201.txt');
      expect(upstream.calls[0].responseType).toBe('stream');
      expect(upstream.calls[0].headers.accept).toBe('*/*');
      expect(download.contentType).toBe('text/plain');
      expect(download.contentLength).toBe(11);
      expect(await readAll(download.stream)).toBe('hello world');
    });

    it('should leave unknown headers empty', async () => {
      const { client } = createClient(() => streamReply(chunkedBody(['x'])));

      const download = await client.downloadFile('acme', 'J1', 'a.bin', 'test-secret');

      expect(download.contentType).toBeNull();
      expect(download.contentLength).toBeNull();
      expect(await readAll(download.stream)).toBe('x');
    });

    it('should fail the stream with STREAM_INTERRUPTED when the upstream breaks', async () => {
      const { client } = createClient(() => streamReply(
        chunkedBody(['partial'], new Error('socket hang up'))
      ));

      const download = await client.downloadFile('acme', 'J1', 'a.bin', 'test-secret');

      await expect(readAll(download.stream)).rejects.toMatchObject({
        code: ApiErrorCode.STREAM_INTERRUPTED,
        message: 'File service stream failed: socket hang up',
        details: { job_id: 'J1', filename: 'a.bin' }
      });
    });

    it('should fail the stream when the upstream stops sending', async () => {
      const stalled = new Readable({ read() {} });
      const { client } = createClient(() => streamReply(stalled), 20);

      const download = await client.downloadFile('acme', 'J1', 'a.bin', 'test-secret');

      await expect(readAll(download.stream)).rejects.toMatchObject({
        code: ApiErrorCode.STREAM_INTERRUPTED,
        message: 'File service sent no data for 20ms'
      });
      expect(stalled.destroyed).toBe(true);
    });

    it('should release the upstream when the caller stops reading', async () => {
      const endless = new Readable({ read() {} });
      const { client } = createClient(() => streamReply(endless));

      const download = await client.downloadFile('acme', 'J1', 'a.bin', 'test-secret');
      download.stream.destroy();
      await new Promise(resolve => setImmediate(resolve));

      expect(endless.destroyed).toBe(true);
    });

    it('should fetch the matching archive for workload jobs', async () => {
      const { client, upstream } = createClient(() => streamReply(chunkedBody(['zip'])));

      const download = await client.downloadFile('acme', 'J3', 'serialconsole.zip', 'test-secret', {
        jobType: 'WorkloadJob'
      });

      expect(upstream.calls[0].url).toBe('https://files.acme.example.test/fs/files/J3/logs/all/serialconsole');
      expect(await readAll(download.stream)).toBe('zip');
    });

    it('should report NOT_FOUND for workload files that name no archive', async () => {
      const { client, upstream } = createClient(() => streamReply(chunkedBody(['zip'])));

      await expect(client.downloadFile('acme', 'J3', 'report.txt', 'test-secret', { jobType: 'WorkloadJob' }))
        .rejects.toMatchObject({
          code: ApiErrorCode.NOT_FOUND,
          details: { job_id: 'J3', filename: 'report.txt' }
        });
      expect(upstream.calls).toHaveLength(0);
    });

    it('should reject traversal before calling the file service', async () => {
      const { client, upstream } = createClient(() => streamReply(chunkedBody(['x'])));

      await expect(client.downloadFile('acme', 'J1', '../other/secret', 'test-secret'))
        .rejects.toMatchObject({ code: ApiErrorCode.INVALID_FILTER });
      expect(upstream.calls).toHaveLength(0);
    });

    it.each([null, undefined, '', 'bad tenant', 'a.b'])(
      'should reject tenant %p without calling the file service',
      async (tenantId) => {
        const { client, upstream } = createClient(() => streamReply(chunkedBody(['x'])));

        await expect(client.downloadFile(tenantId, 'J1', 'a.bin', 'test-secret')).rejects.toMatchObject({
          code: ApiErrorCode.INVALID_TENANT
        });
        expect(upstream.calls).toHaveLength(0);
      }
    );

    it('should route each download to the host of its own tenant', async () => {
      const { client, upstream } = createClient(() => streamReply(chunkedBody(['x'])));

      const first = await client.downloadFile('acme', 'J1', 'a.bin', 'test-secret');
      await readAll(first.stream);
      const second = await client.downloadFile('beta', 'J2', 'a.bin', 'test-secret');
      await readAll(second.stream);

      expect(upstream.calls.map(call => call.url)).toEqual([
        'https://files.acme.example.test/fs/files/J1/iwps/artifacts/out/a.bin',
        'http://localhost:9000/fs/files/J2/iwps/artifacts/out/a.bin'
      ]);
    });

    it('should map a missing file to NOT_FOUND', async () => {
      const { client } = createClient(() => ({ status: 404, data: chunkedBody(['{"message":"gone"}']) }));

      await expect(client.downloadFile('acme', 'J1', 'a.bin', 'test-secret')).rejects.toMatchObject({
        code: ApiErrorCode.NOT_FOUND,
        message: "File 'a.bin' not found for job 'J1'"
      });
    });
  });
});
