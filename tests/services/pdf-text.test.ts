import { describe, it, expect, beforeEach, vi } from 'vitest';

const { getDocumentProxyMock, extractTextMock } = vi.hoisted(() => ({
  getDocumentProxyMock: vi.fn(),
  extractTextMock: vi.fn(),
}));

vi.mock('unpdf', () => ({
  getDocumentProxy: getDocumentProxyMock,
  extractText: extractTextMock,
}));

import { UnpdfTextExtractor } from '../../src/services/pdf-text.js';
import { ParseFailedError } from '../../src/types/result.js';

describe('UnpdfTextExtractor', () => {
  const url = 'https://transport-fc.pl/pdf/ktw1.pdf';
  const extractor = new UnpdfTextExtractor();

  beforeEach(() => {
    getDocumentProxyMock.mockReset();
    extractTextMock.mockReset();
  });

  it('should join page texts with newlines', async () => {
    const proxy = { numPages: 2 };
    getDocumentProxyMock.mockResolvedValueOnce(proxy);
    extractTextMock.mockResolvedValueOnce({ totalPages: 2, text: ['Trasa KTW1', '06:00 Zajezdnia'] });

    const result = await extractor.extract(new Uint8Array([1, 2, 3]), url);

    expect(result).toEqual({ success: true, value: 'Trasa KTW1\n06:00 Zajezdnia' });
    expect(extractTextMock).toHaveBeenCalledWith(proxy, { mergePages: false });
  });

  it('should turn a broken document into a ParseFailedError', async () => {
    getDocumentProxyMock.mockRejectedValueOnce(new Error('Invalid PDF structure.'));

    const result = await extractor.extract(new Uint8Array([0]), url);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ParseFailedError);
      expect(result.error.url).toBe(url);
      expect(result.error.message).toBe('Invalid PDF structure.');
    }
  });
});
