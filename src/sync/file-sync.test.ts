import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  executeFileSync,
  fileActionLabel,
  formatBlobName,
  planFileSync,
  resolveFileTargets,
} from './file-sync.js';
import { MemoryBlobStore } from '../__tests__/mocks/stores.js';

const OLD = new Date('2024-06-01T00:00:00.000Z');
const LOCAL = new Date('2024-06-01T00:10:00.000Z');
const REMOTE = new Date('2024-06-01T00:20:00.000Z');

describe('formatBlobName', () => {
  it('should substitute placeholders', () => {
    expect(formatBlobName('#name#', '/srv/config.json')).toBe('config.json');
    expect(formatBlobName('dev/#stem#.#ext#', '/srv/config.json')).toBe('dev/config.json');
    expect(formatBlobName('#stem#-backup', '/srv/archive.tar.gz')).toBe('archive.tar-backup');
    expect(formatBlobName('fixed-name', '/srv/config.json')).toBe('fixed-name');
  });

  it('should reject an odd number of #s', () => {
    expect(() => formatBlobName('#name', '/srv/a.json')).toThrow('Blob name is malformed (invalid number of #s)');
  });

  it('should reject #ext# for files without an extension', () => {
    expect(() => formatBlobName('#ext#', '/srv/Makefile')).toThrow('No file extension: /srv/Makefile');
  });

  it('should reject unknown placeholders', () => {
    expect(() => formatBlobName('#path#', '/srv/a.json')).toThrow('Invalid placeholder: "path"');
  });
});

describe('file sync', () => {
  let dir: string;
  let store: MemoryBlobStore;

  const write = (name: string, content: string, modified: Date): string => {
    const file = path.join(dir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    fs.utimesSync(file, modified, modified);
    return file;
  };

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'envsync-files-')));
    store = new MemoryBlobStore();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveFileTargets', () => {
    it('should sync the same file once', () => {
      const file = write('a.json', '{}', LOCAL);
      const relative = path.relative(process.cwd(), file);

      expect(resolveFileTargets([file, relative])).toEqual([{ localPath: file, blobName: 'a.json' }]);
    });

    it('should accept files that do not exist yet', () => {
      const file = path.join(dir, 'new.json');
      expect(resolveFileTargets([file], 'env/#name#')).toEqual([{ localPath: file, blobName: 'env/new.json' }]);
    });

    it('should reject files sharing a blob name', () => {
      const a = write('a.json', '1', LOCAL);
      const b = write('sub/a.json', '2', LOCAL);
      expect(() => resolveFileTargets([a, b])).toThrow('Duplicate blob names: a.json');
    });
  });

  describe('planFileSync', () => {
    it('should plan each file, sorted', async () => {
      const pushed = write('local.json', 'L', LOCAL);
      const same = write('same.json', 'S', OLD);
      const pulled = path.join(dir, 'remote-only.json');
      store.add('local.json', 'R', OLD).add('same.json', 'S', REMOTE).add('remote-only.json', 'P', REMOTE);

      const actions = await planFileSync({
        targets: resolveFileTargets([same, pulled, pushed]),
        store,
        mode: 'sync',
      });

      expect(actions.map(a => [a.type, fileActionLabel(a)])).toEqual([
        ['push', 'local.json'],
        ['pull', 'remote-only.json'],
        ['skip', 'same.json'],
      ]);
      expect(actions[0]).toEqual({
        type: 'push',
        data: { target: { localPath: pushed, blobName: 'local.json' }, content: Buffer.from('L'), modified: LOCAL },
      });
      expect(actions[1]).toEqual({
        type: 'pull',
        data: { target: { localPath: pulled, blobName: 'remote-only.json' }, content: Buffer.from('P'), modified: REMOTE },
      });
      expect(actions[2]).toEqual({
        type: 'skip',
        reason: 'unchanged',
        data: { localPath: same, blobName: 'same.json' },
      });
    });

    it('should skip files missing on both sides', async () => {
      const actions = await planFileSync({
        targets: resolveFileTargets([path.join(dir, 'ghost.json')]),
        store,
        mode: 'sync',
      });
      expect(actions).toEqual([
        { type: 'skip', reason: 'not found', data: { localPath: path.join(dir, 'ghost.json'), blobName: 'ghost.json' } },
      ]);
    });

    it('should not read the store for push-always', async () => {
      const file = write('a.json', 'A', OLD);
      store.add('a.json', 'B', REMOTE);

      const actions = await planFileSync({ targets: resolveFileTargets([file]), store, mode: 'push-always' });

      expect(actions.map(a => a.type)).toEqual(['push']);
      expect(store.reads).toEqual([]);
    });

    it('should refuse directories', async () => {
      fs.mkdirSync(path.join(dir, 'folder'));
      await expect(planFileSync({
        targets: resolveFileTargets([path.join(dir, 'folder')]),
        store,
        mode: 'sync',
      })).rejects.toThrow(`Not a file: ${path.join(dir, 'folder')}`);
    });

    it('should wrap store failures', async () => {
      vi.spyOn(store, 'getBlob').mockRejectedValue(new Error('timeout'));
      await expect(planFileSync({
        targets: resolveFileTargets([path.join(dir, 'a.json')]),
        store,
        mode: 'sync',
      })).rejects.toThrow('Failed to read blob a.json: timeout');
    });
  });

  describe('executeFileSync', () => {
    it('should upload pushes and write pulls with their timestamps', async () => {
      const pushed = write('local.json', 'L', LOCAL);
      const pulled = path.join(dir, 'nested', 'remote.json');
      store.add('remote.json', 'R', REMOTE);

      const actions = await planFileSync({
        targets: resolveFileTargets([pushed, pulled]),
        store,
        mode: 'sync',
      });
      const result = await executeFileSync(actions, store);

      expect(result).toEqual({ pushed: 1, pulled: 1, skipped: 0 });
      expect(store.blobs.get('local.json')).toEqual({ name: 'local.json', content: Buffer.from('L'), modified: LOCAL });
      expect(fs.readFileSync(pulled, 'utf-8')).toBe('R');
      expect(fs.statSync(pulled).mtime.getTime()).toBe(REMOTE.getTime());
    });

    it('should wrap upload failures', async () => {
      const file = write('a.json', 'A', LOCAL);
      vi.spyOn(store, 'putBlob').mockRejectedValue(new Error('quota'));

      const actions = await planFileSync({ targets: resolveFileTargets([file]), store, mode: 'sync' });

      await expect(executeFileSync(actions, store)).rejects.toThrow('Failed to upload blob a.json: quota');
    });
  });
});
