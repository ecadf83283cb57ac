import crypto from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RepositoryClient } from '../../infra/http';
import type { UploadProgress, UploadTarget } from '../../shared';
import {
  AuthenticationError,
  CommitError,
  MissingFileEntryError,
  PartUploadError,
  ProtocolError,
  UploadCancelledError,
  ValidationError,
} from '../../utils/errors';
import {
  DRAFT_ID,
  MockRepository,
  REPO_URL,
  STORAGE_URL,
  entriesFor,
  partUrl,
} from '../../__tests__/helpers/mockRepository';
import {
  commitFile,
  initializeFiles,
  md5Base64,
  partRange,
  planParts,
  uploadFiles,
} from '../uploadService';

const MIB = 1024 * 1024;

describe('planParts', () => {
  it('splits 250 MiB at 100 MiB into 100 + 100 + 50', () => {
    expect(planParts(250 * MIB, 100 * MIB)).toEqual({
      partSize: 100 * MIB,
      partCount: 3,
      lastPartSize: 50 * MIB,
    });
  });

  it('does not add an empty trailing part for exact multiples', () => {
    expect(planParts(200 * MIB, 100 * MIB)).toEqual({
      partSize: 100 * MIB,
      partCount: 2,
      lastPartSize: 100 * MIB,
    });
  });

  it('uses one part for a file smaller than the part size', () => {
    expect(planParts(1, 100 * MIB)).toEqual({ partSize: 100 * MIB, partCount: 1, lastPartSize: 1 });
  });

  it('defaults to 100 MiB parts', () => {
    expect(planParts(100 * MIB + 1).partCount).toBe(2);
  });

  it('keeps the part sizes summing to the file size', () => {
    for (const size of [1, 99, 100, 101, 999, 1000, 12345]) {
      const plan = planParts(size, 100);
      let total = 0;
      for (let part = 1; part <= plan.partCount; part++) {
        const { length } = partRange(plan, part);
        expect(length).toBeGreaterThan(0);
        expect(length).toBeLessThanOrEqual(100);
        total += length;
      }
      expect(total).toBe(size);
      expect(plan.partCount).toBe(Math.ceil(size / 100));
    }
  });

  it('rejects a non-positive part size', () => {
    expect(() => planParts(10, 0)).toThrow(ValidationError);
    expect(() => planParts(10, 1.5)).toThrow(ValidationError);
  });

  it('rejects a negative size', () => {
    expect(() => planParts(-1, 10)).toThrow(ValidationError);
  });
});

describe('partRange', () => {
  const plan = planParts(250, 100);

  it('maps part numbers to byte offsets', () => {
    expect(partRange(plan, 1)).toEqual({ offset: 0, length: 100 });
    expect(partRange(plan, 2)).toEqual({ offset: 100, length: 100 });
    expect(partRange(plan, 3)).toEqual({ offset: 200, length: 50 });
  });

  it('rejects part numbers outside the plan', () => {
    expect(() => partRange(plan, 0)).toThrow(ValidationError);
    expect(() => partRange(plan, 4)).toThrow(ValidationError);
  });
});

describe('md5Base64', () => {
  it('returns the base64 MD5 digest', () => {
    expect(md5Base64(Buffer.from('hello'))).toBe('XUFAKrxLKna5cZ2REBfFkg==');
  });
});

describe('upload engine', () => {
  let repo: MockRepository;
  let client: RepositoryClient;
  let tmpDir: string;

  function writeFile(name: string, bytes: Buffer): UploadTarget {
    const filePath = path.join(tmpDir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, bytes);
    return { path: filePath, key: name, size: bytes.length };
  }

  function bytes(length: number, seed = 0): Buffer {
    return Buffer.from(Array.from({ length }, (_, i) => (i + seed) % 256));
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    repo = new MockRepository();
    client = new RepositoryClient({ baseUrl: REPO_URL, token: 'test-secret', dispatcher: repo.agent });
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rdm-upload-engine-'));
  });

  afterEach(async () => {
    await repo.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('initializeFiles', () => {
    it('registers every file in one call with multipart transfer details', async () => {
      const a = writeFile('a.csv', bytes(250));
      const b = writeFile('sub/b.txt', bytes(40));

      const sessions = await initializeFiles(client, DRAFT_ID, [a, b], 100);

      const inits = repo.requestsTo(REPO_URL, '/draft/files');
      expect(inits).toHaveLength(1);
      expect(JSON.parse(String(inits[0].body))).toEqual([
        {
          key: 'a.csv',
          size: 250,
          metadata: { description: 'Uploaded file.' },
          transfer: { type: 'M', parts: 3, part_size: 100 },
        },
        {
          key: 'sub/b.txt',
          size: 40,
          metadata: { description: 'Uploaded file.' },
          transfer: { type: 'M', parts: 1, part_size: 100 },
        },
      ]);
      expect(inits[0].headers.authorization).toBe('Bearer test-secret');
      expect(sessions.get('a.csv')?.parts.map((p) => p.url)).toEqual([
        partUrl('a.csv', 1),
        partUrl('a.csv', 2),
        partUrl('a.csv', 3),
      ]);
    });

    it('sorts part links by part number', async () => {
      const a = writeFile('a.csv', bytes(250));
      repo.initReply = (files) => {
        const [entry] = entriesFor(files);
        return {
          statusCode: 201,
          data: {
            entries: [
              {
                ...entry,
                links: {
                  parts: [3, 1, 2].map((part) => ({ part, url: partUrl('a.csv', part) })),
                },
              },
            ],
          },
        };
      };

      const sessions = await initializeFiles(client, DRAFT_ID, [a], 100);

      expect(sessions.get('a.csv')?.parts.map((p) => p.partNumber)).toEqual([1, 2, 3]);
    });

    it('fails with MissingFileEntryError when a key is absent', async () => {
      const a = writeFile('a.csv', bytes(10));
      const b = writeFile('b.csv', bytes(10));
      repo.initReply = (files) => ({ statusCode: 201, data: { entries: entriesFor(files.slice(0, 1)) } });

      const error = await initializeFiles(client, DRAFT_ID, [a, b], 100).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MissingFileEntryError);
      expect(error).toMatchObject({ key: 'b.csv' });
    });

    it('fails with ProtocolError when the part links are not contiguous', async () => {
      const a = writeFile('a.csv', bytes(250));
      repo.initReply = (files) => {
        const [entry] = entriesFor(files);
        return {
          statusCode: 201,
          data: {
            entries: [
              {
                ...entry,
                links: { parts: [1, 3].map((part) => ({ part, url: partUrl('a.csv', part) })) },
              },
            ],
          },
        };
      };

      await expect(initializeFiles(client, DRAFT_ID, [a], 100)).rejects.toThrow(ProtocolError);
    });

    it('fails with ProtocolError when the declared part size is too large to buffer', async () => {
      const a = writeFile('a.csv', bytes(10));
      repo.initReply = (files) => ({
        statusCode: 201,
        data: {
          entries: entriesFor(files).map((entry) => ({
            ...entry,
            transfer: { type: 'M', parts: 1, part_size: 8 * 1024 * MIB },
          })),
        },
      });

      await expect(initializeFiles(client, DRAFT_ID, [a], 100)).rejects.toThrow(
        /above the supported maximum/,
      );
      expect(repo.partUploads).toHaveLength(0);
    });

    it('fails with ProtocolError when the response has no entries', async () => {
      const a = writeFile('a.csv', bytes(10));
      repo.initReply = () => ({ statusCode: 201, data: { files: [] } });

      await expect(initializeFiles(client, DRAFT_ID, [a], 100)).rejects.toThrow(
        /Unexpected or invalid file initialization response/,
      );
    });
  });

  describe('uploadFiles', () => {
    it('uploads three parts in order to their URLs and commits once', async () => {
      const content = bytes(250);
      const target = writeFile('data.bin', content);

      await uploadFiles(client, DRAFT_ID, [target], { partSize: 100 });

      const uploads = repo.partUploads;
      expect(uploads.map((u) => u.part)).toEqual([1, 2, 3]);
      expect(uploads.map((u) => u.request.body)).toEqual([
        content.subarray(0, 100),
        content.subarray(100, 200),
        content.subarray(200, 250),
      ]);
      expect(uploads.map((u) => u.request.headers['content-length'])).toEqual(['100', '100', '50']);
      expect(uploads[2].request.headers['content-md5']).toBe(
        crypto.createHash('md5').update(content.subarray(200, 250)).digest('base64'),
      );
      expect(uploads.some((u) => 'authorization' in u.request.headers)).toBe(false);
      expect(repo.commits).toEqual(['data.bin']);
    });

    it('commits each file after its last part and before the next file starts', async () => {
      const a = writeFile('a.bin', bytes(150));
      const b = writeFile('nested/b.bin', bytes(20, 7));

      await uploadFiles(client, DRAFT_ID, [a, b], { partSize: 100 });

      const sequence = repo.requests.map((r) =>
        r.origin === STORAGE_URL ? `PUT ${r.path}` : `POST ${r.path}`,
      );
      expect(sequence).toEqual([
        `POST /api/records/${DRAFT_ID}/draft/files`,
        `PUT /${DRAFT_ID}/a.bin/1`,
        `PUT /${DRAFT_ID}/a.bin/2`,
        `POST /api/records/${DRAFT_ID}/draft/files/a.bin/commit`,
        `PUT /${DRAFT_ID}/nested%2Fb.bin/1`,
        `POST /api/records/${DRAFT_ID}/draft/files/nested/b.bin/commit`,
      ]);
    });

    it('sends no part upload when an entry is missing', async () => {
      const a = writeFile('a.bin', bytes(10));
      const b = writeFile('b.bin', bytes(10));
      repo.initReply = (files) => ({ statusCode: 201, data: { entries: entriesFor(files.slice(1)) } });

      await expect(uploadFiles(client, DRAFT_ID, [a, b], { partSize: 100 })).rejects.toThrow(
        MissingFileEntryError,
      );
      expect(repo.partUploads).toHaveLength(0);
      expect(repo.commits).toHaveLength(0);
    });

    it('stops at the first failed part and leaves later files untouched', async () => {
      const first = writeFile('one.bin', bytes(50));
      const second = writeFile('two.bin', bytes(150));
      const third = writeFile('three.bin', bytes(50));
      repo.partReply = (key, part) =>
        key === 'two.bin' && part === 1
          ? { statusCode: 500, data: 'storage unavailable' }
          : { statusCode: 200, data: '' };

      const error = await uploadFiles(client, DRAFT_ID, [first, second, third], {
        partSize: 100,
      }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PartUploadError);
      expect(error).toMatchObject({ key: 'two.bin', partNumber: 1, statusCode: 500 });
      expect(repo.commits).toEqual(['one.bin']);
      expect(repo.partUploads.map((u) => `${u.key}#${u.part}`)).toEqual(['one.bin#1', 'two.bin#1']);
    });

    it('treats any status other than 200 from storage as a failure', async () => {
      const target = writeFile('a.bin', bytes(10));
      repo.partReply = () => ({ statusCode: 204, data: '' });

      await expect(uploadFiles(client, DRAFT_ID, [target], { partSize: 100 })).rejects.toThrow(
        PartUploadError,
      );
      expect(repo.commits).toHaveLength(0);
    });

    it('reports monotonic progress ending at the file size', async () => {
      const target = writeFile('a.bin', bytes(250));
      const events: UploadProgress[] = [];

      await uploadFiles(client, DRAFT_ID, [target], {
        partSize: 100,
        onProgress: (progress) => events.push(progress),
      });

      expect(events.map((e) => e.loaded)).toEqual([0, 100, 200, 250]);
      expect(events.map((e) => e.partNumber)).toEqual([0, 1, 2, 3]);
      expect(events.map((e) => e.percent)).toEqual([0, 40, 80, 100]);
      expect(events.every((e) => e.total === 250 && e.partCount === 3)).toBe(true);
    });

    it('stops before the next part once the signal is aborted', async () => {
      const target = writeFile('a.bin', bytes(250));
      const controller = new AbortController();

      const error = await uploadFiles(client, DRAFT_ID, [target], {
        partSize: 100,
        signal: controller.signal,
        onProgress: (progress) => {
          if (progress.partNumber === 1) controller.abort();
        },
      }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UploadCancelledError);
      expect(repo.partUploads.map((u) => u.part)).toEqual([1]);
      expect(repo.commits).toHaveLength(0);
    });

    it('makes no request when already aborted', async () => {
      const target = writeFile('a.bin', bytes(10));
      const controller = new AbortController();
      controller.abort();

      await expect(
        uploadFiles(client, DRAFT_ID, [target], { partSize: 100, signal: controller.signal }),
      ).rejects.toThrow(UploadCancelledError);
      expect(repo.requests).toHaveLength(0);
    });
  });

  describe('commitFile', () => {
    it('turns an HTTP failure into CommitError', async () => {
      repo.commitReply = () => ({ statusCode: 500, data: 'checksum mismatch' });

      const error = await commitFile(client, DRAFT_ID, 'a.bin').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CommitError);
      expect(error).toMatchObject({ key: 'a.bin', statusCode: 500, body: 'checksum mismatch' });
    });

    it('passes authentication failures through unchanged', async () => {
      repo.commitReply = () => ({ statusCode: 403, data: { message: 'forbidden' } });

      await expect(commitFile(client, DRAFT_ID, 'a.bin')).rejects.toThrow(AuthenticationError);
    });

    it('encodes each key segment separately', async () => {
      await commitFile(client, DRAFT_ID, 'raw data/run 1.csv');

      expect(repo.requestsTo(REPO_URL, '/commit')[0].path).toBe(
        `/api/records/${DRAFT_ID}/draft/files/raw%20data/run%201.csv/commit`,
      );
    });
  });
});
