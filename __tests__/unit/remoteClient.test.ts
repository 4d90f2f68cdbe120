import { buildRequestBody, HttpLookupClient, type RemoteLookupParams } from '@/lib/lookup/remoteClient';

jest.mock('@/lib/logger', () => ({
  logDebug: jest.fn(),
  logInfo: jest.fn(),
  logWarn: jest.fn(),
  logError: jest.fn(),
}));

const ENDPOINT = 'https://lookup.test/findIngredients';

const PARAMS: RemoteLookupParams = { productName: 'Digestives', brand: "McVitie's", maxResults: 1 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function spyOnFetch() {
  return jest.spyOn(global, 'fetch');
}

describe('HttpLookupClient', () => {
  let fetchSpy: ReturnType<typeof spyOnFetch>;

  beforeEach(() => {
    fetchSpy = spyOnFetch();
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('reports a missing endpoint as not configured', async () => {
    const result = await new HttpLookupClient(undefined).lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('not_configured');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('reports an invalid endpoint as not configured', async () => {
    const result = await new HttpLookupClient('not a url').lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('not_configured');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('posts the query and normalizes the response', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({
        ingredients_found: true,
        product_name: 'Digestives',
        brand: "McVitie's",
        serving_size: '1 biscuit (15g)',
        ingredients_text: 'wheat flour, palm oil, wholemeal wheat flour, sugar',
        nutrition_per_100g: { calories: 480, protein: 7, salt: null },
        matches: null,
      })
    );

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result).toEqual({
      success: true,
      data: {
        found: true,
        productName: 'Digestives',
        brand: "McVitie's",
        servingSize: '1 biscuit (15g)',
        ingredientsText: 'wheat flour, palm oil, wholemeal wheat flour, sugar',
        nutrition: { calories: 480, protein: 7 },
      },
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      productName: 'Digestives',
      brand: "McVitie's",
      maxResults: 1,
    });
  });

  it('maps a throttled response to a window error', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: 'slow down' }, 429));

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'window_exceeded',
        waitSeconds: 60,
        message: 'Search limit reached. Please wait 60 seconds before searching again.',
      },
    });
  });

  it('maps other error statuses to a server error', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: 'boom' }, 500));

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result).toEqual({
      success: false,
      error: { code: 'server_error', statusCode: 500, message: 'Server error (500). Please try again later.' },
    });
  });

  it('rejects a body that is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('invalid_response');
  });

  it('rejects a body with the wrong shape', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ product: 'Digestives' }));

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result.success ? null : result.error.code).toBe('invalid_response');
  });

  it('maps a failed request to a network error', async () => {
    fetchSpy.mockRejectedValue(new Error('socket hang up'));

    const result = await new HttpLookupClient(ENDPOINT).lookup(PARAMS);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'network_error',
        message: 'Network error. Please check your connection and try again.',
        details: 'socket hang up',
      },
    });
  });
});

describe('buildRequestBody', () => {
  it('leaves out empty optional fields', () => {
    expect(buildRequestBody({ productName: 'Beans', brand: ' ', barcode: '', maxResults: 2 })).toEqual({
      productName: 'Beans',
      maxResults: 2,
    });
  });

  it('keeps only the refinement fields that are set', () => {
    expect(
      buildRequestBody({
        productName: 'Beans',
        barcode: '5000157024671',
        maxResults: 1,
        refinementContext: { store: 'Tesco', packageSize: '' },
      })
    ).toEqual({
      productName: 'Beans',
      barcode: '5000157024671',
      maxResults: 1,
      refinementContext: { store: 'Tesco' },
    });
  });

  it('drops an empty refinement context', () => {
    expect(
      buildRequestBody({ productName: 'Beans', maxResults: 1, refinementContext: {} })
    ).toEqual({ productName: 'Beans', maxResults: 1 });
  });
});
