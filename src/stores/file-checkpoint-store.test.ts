import {
  type FileHandle,
  mkdir,
  mkdtemp,
  open,
  readdir,
  rm,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CheckpointError } from '~/models/errors';

import FileCheckpointStore from './file-checkpoint-store';

describe('FileCheckpointStore', () => {
  let root: string;
  let directory: string;
  const now = () => new Date('2024-06-01T10:00:00.000Z');

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'checkpoints-'));
    directory = join(root, 'nested');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  /** Spy on `sync` of every FileHandle. */
  const spyOnSync = async () => {
    const handle = await open(join(root, 'handle'), 'w');
    const prototype: FileHandle = Object.getPrototypeOf(handle);
    await handle.close();
    return vi.spyOn(prototype, 'sync');
  };

  test('returns null for a source that never completed a unit', async () => {
    const store = new FileCheckpointStore(directory, now);

    await expect(store.load('daily-herald')).resolves.toBeNull();
  });

  test('persists an advance and reads it back from a fresh instance', async () => {
    const checkpoint = await new FileCheckpointStore(directory, now).advance(
      'daily-herald',
      '2024-05-01',
    );

    expect(checkpoint).toEqual({
      sourceId: 'daily-herald',
      lastCompletedUnitKey: '2024-05-01',
      updatedAt: '2024-06-01T10:00:00.000Z',
    });
    await expect(new FileCheckpointStore(directory).load('daily-herald')).resolves.toEqual(
      checkpoint,
    );
    await expect(readdir(directory)).resolves.toEqual(['daily-herald.json']);
  });

  test('flushes the checkpoint to disk before renaming it into place', async () => {
    const sync = await spyOnSync();
    const store = new FileCheckpointStore(directory, now);

    await store.advance('daily-herald', '2024-05-01');

    expect(sync).toHaveBeenCalledTimes(1);
    await expect(store.load('daily-herald')).resolves.toMatchObject({
      lastCompletedUnitKey: '2024-05-01',
    });
  });

  test('keeps the previous checkpoint when the flush fails', async () => {
    const store = new FileCheckpointStore(directory, now);
    await store.advance('daily-herald', '2024-05-01');
    const sync = await spyOnSync();
    sync.mockRejectedValueOnce(new Error('I/O error'));

    await expect(store.advance('daily-herald', '2024-05-02')).rejects.toThrow(
      'Could not write checkpoint: I/O error',
    );
    await expect(store.load('daily-herald')).resolves.toMatchObject({
      lastCompletedUnitKey: '2024-05-01',
    });
    await expect(readdir(directory)).resolves.toEqual(['daily-herald.json']);
  });

  test('keeps page checkpoints as numbers', async () => {
    const store = new FileCheckpointStore(directory, now);

    await store.advance('city-wire', 1);
    await store.advance('city-wire', 4);

    await expect(store.load('city-wire')).resolves.toMatchObject({ lastCompletedUnitKey: 4 });
  });

  test('refuses to move the watermark backwards or keep it in place', async () => {
    const store = new FileCheckpointStore(directory, now);
    await store.advance('daily-herald', '2024-05-02');

    await expect(store.advance('daily-herald', '2024-05-01')).rejects.toBeInstanceOf(
      CheckpointError,
    );
    await expect(store.advance('daily-herald', '2024-05-02')).rejects.toBeInstanceOf(
      CheckpointError,
    );
    await expect(store.load('daily-herald')).resolves.toMatchObject({
      lastCompletedUnitKey: '2024-05-02',
    });
  });

  test('refuses to switch a date checkpoint to a page number', async () => {
    const store = new FileCheckpointStore(directory, now);
    await store.advance('daily-herald', '2024-05-02');

    await expect(store.advance('daily-herald', 3)).rejects.toThrow(
      'Checkpoint holds 2024-05-02; cannot advance to 3',
    );
  });

  test('reports a corrupt checkpoint file instead of starting over', async () => {
    await mkdir(directory, { recursive: true });
    await writeFile(join(directory, 'daily-herald.json'), '{"sourceId": "daily-her', 'utf-8');
    const store = new FileCheckpointStore(directory, now);

    await expect(store.load('daily-herald')).rejects.toThrow('Checkpoint file is not valid JSON');
  });

  test('rejects a checkpoint file that belongs to another source', async () => {
    await mkdir(directory, { recursive: true });
    await writeFile(
      join(directory, 'daily-herald.json'),
      JSON.stringify({
        sourceId: 'city-wire',
        lastCompletedUnitKey: 2,
        updatedAt: '2024-06-01T10:00:00.000Z',
      }),
      'utf-8',
    );
    const store = new FileCheckpointStore(directory, now);

    await expect(store.load('daily-herald')).rejects.toThrow(
      'Checkpoint file has an unexpected shape',
    );
  });
});
