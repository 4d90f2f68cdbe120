import { GoogleGenAI } from '@google/genai';
import {
  buildLookupPrompt,
  GeminiLookupClient,
  stripCodeFence,
} from '@/lib/lookup/geminiClient';
import type { RemoteLookupParams } from '@/lib/lookup/remoteClient';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: mockGenerateContent },
  })),
  ThinkingLevel: { LOW: 'LOW' },
}));

jest.mock('@/lib/logger', () => ({
  logDebug: jest.fn(),
  logInfo: jest.fn(),
  logWarn: jest.fn(),
  logError: jest.fn(),
}));

const PARAMS: RemoteLookupParams = { productName: 'Dairy Milk', brand: 'Cadbury', maxResults: 3 };

const BAR_110G = {
  size_description: '110g bar',
  product_name: 'Dairy Milk 110g',
  brand: 'Cadbury',
  serving_size_g: 25,
  ingredients_text: 'milk, sugar, cocoa butter, cocoa mass',
  nutrition_per_100g: { calories: 534, protein: 7.3, fat: 30, fiber: null },
  source_url: 'https://www.tesco.com/groceries/en-GB/products/2',
  source_name: 'Tesco',
  confidence_score: 92,
};

const BAR_200G = {
  size_description: '200g bar',
  product_name: 'Dairy Milk 200g',
  ingredients_text: 'milk, sugar',
  nutrition_per_100g: null,
  confidence_score: 70,
};

const UNUSABLE = { product_name: 'Dairy Milk Buttons', ingredients_text: 'not listed' };

describe('GeminiLookupClient', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
    jest.mocked(GoogleGenAI).mockClear();
  });

  it('reports a missing API key as not configured', async () => {
    const result = await new GeminiLookupClient(undefined).lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('not_configured');
    expect(GoogleGenAI).not.toHaveBeenCalled();
  });

  it('turns usable variants into a result with alternatives', async () => {
    mockGenerateContent.mockResolvedValue({ text: JSON.stringify([BAR_110G, UNUSABLE, BAR_200G]) });

    const result = await new GeminiLookupClient('test-key', 'gemini-test').lookup(PARAMS);

    expect(result.success).toBe(true);
    const data = result.success ? result.data : null;
    expect(data).toEqual({
      found: true,
      productName: 'Dairy Milk 110g',
      brand: 'Cadbury',
      servingSize: '25g',
      ingredientsText: 'milk, sugar, cocoa butter, cocoa mass',
      nutrition: { calories: 534, protein: 7.3, fat: 30 },
      sourceUrl: 'https://www.tesco.com/groceries/en-GB/products/2',
      matches: [
        {
          productName: 'Dairy Milk 110g',
          brand: 'Cadbury',
          servingSize: '25g',
          ingredientsText: 'milk, sugar, cocoa butter, cocoa mass',
          nutrition: { calories: 534, protein: 7.3, fat: 30 },
          sourceUrl: 'https://www.tesco.com/groceries/en-GB/products/2',
          confidenceScore: 92,
          sourceName: 'Tesco',
        },
        {
          productName: 'Dairy Milk 200g',
          brand: 'Cadbury',
          ingredientsText: 'milk, sugar',
          nutrition: {},
          confidenceScore: 70,
        },
      ],
    });

    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(mockGenerateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gemini-test',
        config: {
          thinkingConfig: { thinkingLevel: 'LOW' },
          responseMimeType: 'application/json',
          abortSignal: expect.any(AbortSignal),
        },
      })
    );
  });

  it('leaves out alternatives when only one result is wanted', async () => {
    mockGenerateContent.mockResolvedValue({ text: JSON.stringify([BAR_110G, BAR_200G]) });

    const result = await new GeminiLookupClient('test-key').lookup({ ...PARAMS, maxResults: 1 });

    const data = result.success ? result.data : null;
    expect(data?.productName).toBe('Dairy Milk 110g');
    expect(data?.matches).toBeUndefined();
  });

  it('reports an empty list as not found', async () => {
    mockGenerateContent.mockResolvedValue({ text: '```json\n[]\n```' });

    const result = await new GeminiLookupClient('test-key').lookup(PARAMS);

    expect(result).toEqual({ success: true, data: { found: false } });
  });

  it('rejects an empty answer', async () => {
    mockGenerateContent.mockResolvedValue({ text: '' });

    const result = await new GeminiLookupClient('test-key').lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('invalid_response');
  });

  it('rejects an answer that is not JSON', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'Sorry, I could not find that product.' });

    const result = await new GeminiLookupClient('test-key').lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('invalid_response');
  });

  it('rejects JSON with the wrong shape', async () => {
    mockGenerateContent.mockResolvedValue({ text: JSON.stringify({ product_name: 'Dairy Milk' }) });

    const result = await new GeminiLookupClient('test-key').lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('invalid_response');
  });

  it('gives up after 30 seconds with a network error', async () => {
    jest.useFakeTimers();
    try {
      mockGenerateContent.mockReturnValue(new Promise(() => undefined));

      const pending = new GeminiLookupClient('test-key').lookup(PARAMS);
      await jest.advanceTimersByTimeAsync(30_000);

      await expect(pending).resolves.toEqual({
        success: false,
        error: {
          code: 'network_error',
          message: 'Network error. Please check your connection and try again.',
          details: 'Gemini request timed out after 30000ms',
        },
      });
      const [request] = mockGenerateContent.mock.calls[0];
      expect(request.config.abortSignal.aborted).toBe(true);
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });

  it('clears its timeout once Gemini answers', async () => {
    jest.useFakeTimers();
    try {
      mockGenerateContent.mockResolvedValue({ text: '[]' });

      await new GeminiLookupClient('test-key').lookup(PARAMS);

      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });

  it('maps SDK failures to a network error', async () => {
    mockGenerateContent.mockRejectedValue(new Error('fetch failed'));

    const result = await new GeminiLookupClient('test-key').lookup(PARAMS);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'network_error',
        message: 'Network error. Please check your connection and try again.',
        details: 'fetch failed',
      },
    });
  });
});

describe('buildLookupPrompt', () => {
  it('includes the query and refinement hints', () => {
    const prompt = buildLookupPrompt({
      ...PARAMS,
      barcode: '7622210449283',
      refinementContext: { store: 'Tesco', packageSize: '110g' },
    });

    expect(prompt).toContain('Product: "Dairy Milk" by Cadbury');
    expect(prompt).toContain('Barcode: 7622210449283');
    expect(prompt).toContain('Sold at: Tesco');
    expect(prompt).toContain('Package size: 110g');
    expect(prompt).not.toContain('Details:');
  });
});

describe('stripCodeFence', () => {
  it('removes a Markdown fence', () => {
    expect(stripCodeFence('```json\n[1]\n```')).toBe('[1]');
    expect(stripCodeFence('```\n{}\n```')).toBe('{}');
  });

  it('leaves plain text alone', () => {
    expect(stripCodeFence('  [1]  ')).toBe('[1]');
  });
});
