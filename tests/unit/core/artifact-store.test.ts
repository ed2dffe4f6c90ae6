import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ArtifactStore, hashArtifact } from '../../../src/core/artifact-store.js';

describe('ArtifactStore', () => {
  let rootDir: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slotswap-store-'));
    store = new ArtifactStore({ rootDir });
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  describe('save', () => {
    it('writes numbered versions with metadata', async () => {
      const first = await store.save('greeter', Buffer.from('weights-1'));
      const second = await store.save('greeter', Buffer.from('weights-2'));

      expect(first.duplicate).toBe(false);
      expect(first.version).toMatchObject({
        modelName: 'greeter',
        version: 1,
        hash: hashArtifact(Buffer.from('weights-1')),
        sizeBytes: 9,
      });
      expect(second.version.version).toBe(2);

      const stored = await fs.readFile(path.join(rootDir, 'greeter', 'versions', '2', 'model.tar.gz'));
      expect(stored.toString()).toBe('weights-2');
      expect(second.version.path).toBe(
        path.join(rootDir, 'greeter', 'versions', '2', 'model.tar.gz')
      );
    });

    it('returns the existing version for identical content', async () => {
      await store.save('greeter', Buffer.from('same'));
      await store.save('greeter', Buffer.from('other'));

      const again = await store.save('greeter', Buffer.from('same'));

      expect(again).toMatchObject({ duplicate: true, version: { version: 1 } });
      expect((await store.listVersions('greeter')).map((v) => v.version)).toEqual([1, 2]);
    });

    it('numbers concurrent saves without gaps or collisions', async () => {
      const results = await Promise.all(
        ['a', 'b', 'c', 'd'].map((content) => store.save('greeter', Buffer.from(content)))
      );

      expect(results.map((result) => result.version.version).sort()).toEqual([1, 2, 3, 4]);
    });

    it('keeps versions of different models apart', async () => {
      await store.save('greeter', Buffer.from('g'));
      const other = await store.save('summarizer', Buffer.from('s'));

      expect(other.version.version).toBe(1);
      expect(await store.listModels()).toEqual(['greeter', 'summarizer']);
    });

    it('rejects names that could escape the store', async () => {
      await expect(store.save('../outside', Buffer.from('x'))).rejects.toMatchObject({
        code: 'InvalidParams',
      });
    });
  });

  describe('bindSlot', () => {
    it('points the slot link at the version directory', async () => {
      const { version: v1 } = await store.save('greeter', Buffer.from('one'));
      const { version: v2 } = await store.save('greeter', Buffer.from('two'));

      await store.bindSlot('greeter', 'A', v1);
      await store.bindSlot('greeter', 'B', v2);
      await store.bindSlot('greeter', 'A', v2);

      expect(await fs.readlink(path.join(rootDir, 'greeter', 'slot-a'))).toBe(
        path.join('versions', '2')
      );
      expect(await store.boundVersion('greeter', 'A')).toBe(2);
      expect(await store.boundVersion('greeter', 'B')).toBe(2);

      const through = await fs.readFile(path.join(rootDir, 'greeter', 'slot-a', 'model.tar.gz'));
      expect(through.toString()).toBe('two');
    });

    it('reports unbound slots as null', async () => {
      expect(await store.boundVersion('greeter', 'B')).toBeNull();
    });
  });

  describe('listing', () => {
    it('returns the latest version and skips unreadable entries', async () => {
      await store.save('greeter', Buffer.from('one'));
      await store.save('greeter', Buffer.from('two'));
      await fs.mkdir(path.join(rootDir, 'greeter', 'versions', '7'));
      await fs.writeFile(path.join(rootDir, 'greeter', 'versions', '7', 'metadata.json'), '{}');

      expect((await store.latest('greeter'))?.version).toBe(2);
    });

    it('returns nothing for an empty root', async () => {
      const empty = new ArtifactStore({ rootDir: path.join(rootDir, 'missing') });

      expect(await empty.listModels()).toEqual([]);
      expect(await empty.latest('greeter')).toBeNull();
    });

    it('ignores directories that are not model names or hold no versions', async () => {
      await store.save('greeter', Buffer.from('one'));
      await fs.mkdir(path.join(rootDir, 'Not A Model'));
      await fs.mkdir(path.join(rootDir, 'empty-model'));

      expect(await store.listModels()).toEqual(['greeter']);
    });
  });

  describe('port records', () => {
    it('writes ports.json beside the versions', async () => {
      await store.writePorts('greeter', { A: 7100, B: 7101 });

      const raw = await fs.readFile(path.join(rootDir, 'greeter', 'ports.json'), 'utf8');
      expect(JSON.parse(raw)).toEqual({ A: 7100, B: 7101 });
      expect(await store.readPorts('greeter')).toEqual({ A: 7100, B: 7101 });
    });

    it('treats missing or malformed records as absent', async () => {
      expect(await store.readPorts('greeter')).toBeNull();

      await fs.mkdir(path.join(rootDir, 'summarizer'));
      await fs.writeFile(path.join(rootDir, 'summarizer', 'ports.json'), '{"A":"7000"}');
      expect(await store.readPorts('summarizer')).toBeNull();

      await fs.writeFile(path.join(rootDir, 'summarizer', 'ports.json'), 'not json');
      expect(await store.readPorts('summarizer')).toBeNull();
    });
  });
});
