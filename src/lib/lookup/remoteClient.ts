import { LookupPayloadSchema } from '@/lib/lookup/schemas';
import { normalizeLookupPayload } from '@/lib/normalizer';
import {
  fail,
  lookupErrors,
  ok,
  type ActionResult,
  type LookupError,
  type LookupResult,
  type RefinementContext,
} from '@/lib/types';
import { logDebug, logError, logInfo, logWarn } from '@/lib/logger';

const console = {
  log: logDebug,
  info: logInfo,
  warn: logWarn,
  error: logError,
} as const;

export const REMOTE_TIMEOUT_MS = 30_000;
// The endpoint does not send Retry-After; it throttles per minute
const SERVER_RATE_LIMIT_WAIT_SECONDS = 60;

export interface RemoteLookupParams {
  productName: string;
  brand?: string;
  barcode?: string;
  maxResults: number;
  refinementContext?: RefinementContext;
}

/**
 * The only network-dependent step of a lookup.
 * Implementations report failures as values, never by throwing.
 */
export interface RemoteLookupClient {
  lookup(params: RemoteLookupParams): Promise<ActionResult<LookupResult, LookupError>>;
}

/**
 * Request body for the find-ingredients endpoint; empty refinement
 * fields and an empty brand are left out.
 */
export function buildRequestBody(params: RemoteLookupParams): Record<string, unknown> {
  const body: Record<string, unknown> = {
    productName: params.productName,
    maxResults: params.maxResults,
  };

  if (params.brand && params.brand.trim().length > 0) {
    body.brand = params.brand;
  }
  if (params.barcode && params.barcode.trim().length > 0) {
    body.barcode = params.barcode;
  }

  const refinement = params.refinementContext;
  if (refinement) {
    const refinementBody: Record<string, string> = {};
    if (refinement.store) refinementBody.store = refinement.store;
    if (refinement.packageSize) refinementBody.packageSize = refinement.packageSize;
    if (refinement.additionalDetails) refinementBody.additionalDetails = refinement.additionalDetails;
    if (Object.keys(refinementBody).length > 0) {
      body.refinementContext = refinementBody;
    }
  }

  return body;
}

/**
 * Client for the HTTPS find-ingredients endpoint.
 */
export class HttpLookupClient implements RemoteLookupClient {
  constructor(
    private readonly endpointUrl: string | undefined,
    private readonly timeoutMs: number = REMOTE_TIMEOUT_MS
  ) {}

  async lookup(params: RemoteLookupParams): Promise<ActionResult<LookupResult, LookupError>> {
    if (!this.endpointUrl) {
      console.error('FIND_INGREDIENTS_URL not configured');
      return fail(lookupErrors.notConfigured('missing endpoint URL'));
    }

    let endpoint: URL;
    try {
      endpoint = new URL(this.endpointUrl);
    } catch {
      console.error('Invalid find-ingredients URL', { url: this.endpointUrl });
      return fail(lookupErrors.notConfigured('invalid endpoint URL'));
    }

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildRequestBody(params)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Remote lookup request failed', { productName: params.productName, error: message });
      return fail(lookupErrors.networkError(message));
    }

    if (response.status === 429) {
      console.warn('Remote lookup throttled by server');
      return fail(lookupErrors.windowExceeded(SERVER_RATE_LIMIT_WAIT_SECONDS));
    }

    if (!response.ok) {
      console.error('Remote lookup returned an error status', { status: response.status });
      return fail(lookupErrors.serverError(response.status));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      console.error('Remote lookup returned invalid JSON', error);
      return fail(lookupErrors.invalidResponse('body is not JSON'));
    }

    const parsed = LookupPayloadSchema.safeParse(body);
    if (!parsed.success) {
      console.error('Remote lookup payload did not match schema', {
        issues: parsed.error.issues.slice(0, 3).map((issue) => issue.path.join('.')),
      });
      return fail(lookupErrors.invalidResponse('payload schema mismatch'));
    }

    const result = normalizeLookupPayload(parsed.data, params.maxResults);
    console.info('Remote lookup completed', {
      productName: params.productName,
      found: result.found,
      matches: result.matches?.length ?? 0,
    });
    return ok(result);
  }
}
