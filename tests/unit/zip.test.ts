import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { extractZipEntry, listZipEntries } from '../../src/codecs';
import { decodeText, encodeText } from '../../src/codecs/text';
import { FormatError, NotFoundError } from '../../src/errors';

async function archive(entries: Record<string, string>, folders: string[] = []): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const folder of folders) {
    zip.folder(folder);
  }
  for (const [name, text] of Object.entries(entries)) {
    zip.file(name, text);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

describe('zip codec', () => {
  it('should return the first file entry by default', async () => {
    const bytes = await archive({ 'first.txt': 'one', 'second.txt': 'two' }, ['docs']);

    expect(decodeText(await extractZipEntry(bytes, '/a.zip'))).toBe('one');
  });

  it('should return a named entry', async () => {
    const bytes = await archive({ 'first.txt': 'one', 'data/second.txt': 'two' });

    expect(decodeText(await extractZipEntry(bytes, '/a.zip', 'data/second.txt'))).toBe('two');
  });

  it('should list file entries', async () => {
    const bytes = await archive({ 'first.txt': 'one', 'data/second.txt': 'two' });

    expect(await listZipEntries(bytes)).toEqual(['first.txt', 'data/second.txt']);
  });

  it('should report a missing entry', async () => {
    const bytes = await archive({ 'first.txt': 'one' });

    await expect(extractZipEntry(bytes, '/a.zip', 'nope.txt')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject an archive with no files', async () => {
    const bytes = await archive({}, ['empty']);

    await expect(extractZipEntry(bytes, '/a.zip')).rejects.toThrow('Archive /a.zip holds no files');
  });

  it('should reject bytes that are not an archive', async () => {
    await expect(extractZipEntry(encodeText('plain'), '/a.zip')).rejects.toBeInstanceOf(FormatError);
  });
});
