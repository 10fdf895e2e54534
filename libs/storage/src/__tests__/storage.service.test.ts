import { Readable } from 'stream';
import { StorageService } from '../storage.service';
import { StorageObjectNotFoundError } from '../storage.errors';
import { InMemoryObjectStore } from '../stores/in-memory-object-store';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('StorageService', () => {
  let store: InMemoryObjectStore;
  let service: StorageService;

  beforeEach(() => {
    store = new InMemoryObjectStore();
    service = new StorageService(store);
  });

  it('uploads under uploads/ and downloads the same bytes', async () => {
    const stored = await service.uploadFile(Buffer.from('%PDF'), 'bill.pdf', 'application/pdf');

    expect(stored).toMatch(/^bill_\d+_[0-9a-f]{8}\.pdf$/);
    expect(await store.list('uploads/')).toEqual([`uploads/${stored}`]);
    expect(store.contentTypeOf(`uploads/${stored}`)).toBe('application/pdf');
    expect((await service.downloadUpload(stored)).toString()).toBe('%PDF');
  });

  it('rejects downloads of unknown uploads', async () => {
    await expect(service.downloadUpload('nope.png')).rejects.toBeInstanceOf(
      StorageObjectNotFoundError,
    );
  });

  it('streams artifacts and returns null for missing ones', async () => {
    await service.putArtifact('a_1_00000000.txt', Buffer.from('hello'), 'text/plain');

    const stream = await service.openArtifact('a_1_00000000.txt');
    if (!stream) throw new Error('artifact missing');
    expect(await readAll(stream)).toBe('hello');
    expect(await service.openArtifact('a_1_00000000.json')).toBeNull();
  });

  it('deletes the upload and its artifacts but nothing else', async () => {
    const stored = 'inv_1700000000_abcd1234.pdf';
    const png = 'image/png';
    await store.put(`uploads/${stored}`, Buffer.from('pdf'), 'application/pdf');
    await store.put('outputs/inv_1700000000_abcd1234.txt', Buffer.from('t'), 'text/plain');
    await store.put('outputs/inv_1700000000_abcd1234.json', Buffer.from('{}'), 'application/json');
    await store.put('outputs/inv_1700000000_abcd1234_page_1.png', Buffer.from('p'), png);
    await store.put('outputs/inv_1700000000_abcd1234_page_2.png', Buffer.from('p'), png);
    await store.put('outputs/inv_1700000000_abcd12345.txt', Buffer.from('t'), 'text/plain');
    await store.put('uploads/inv_1700000000_ffff0000.pdf', Buffer.from('pdf'), 'application/pdf');

    expect(await service.deleteTaskFiles(stored)).toBe(5);
    expect((await store.list('')).sort()).toEqual([
      'outputs/inv_1700000000_abcd12345.txt',
      'uploads/inv_1700000000_ffff0000.pdf',
    ]);
  });
});
