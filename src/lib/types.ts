export * from '@/lib/types/product';

// ============================================
// Shared Result Types
// ============================================

/**
 * Standard error structure for lookup failures.
 * `message` is safe to show to the user as-is.
 */
export interface ActionError {
  code: string;
  message: string; // User-friendly message for display
  details?: string; // Technical details for logging
}

export type RateLimitError =
  | (ActionError & { code: 'window_exceeded'; waitSeconds: number })
  | (ActionError & { code: 'daily_limit_reached' });

export type LookupError =
  | RateLimitError
  | (ActionError & { code: 'not_configured' })
  | (ActionError & { code: 'invalid_response' })
  | (ActionError & { code: 'server_error'; statusCode: number })
  | (ActionError & { code: 'network_error' })
  | (ActionError & { code: 'no_ingredients_found' })
  | (ActionError & { code: 'invalid_request' });

/**
 * Result wrapper used by every fallible operation in the engine.
 * Nothing in the lookup path throws to its caller.
 */
export type ActionResult<T, E extends ActionError = ActionError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends ActionError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// ============================================
// Error constructors
// ============================================

export const lookupErrors = {
  windowExceeded(waitSeconds: number): RateLimitError {
    return {
      code: 'window_exceeded',
      waitSeconds,
      message: `Search limit reached. Please wait ${waitSeconds} seconds before searching again.`,
    };
  },
  dailyLimitReached(maxPerDay: number): RateLimitError {
    return {
      code: 'daily_limit_reached',
      message: `Daily verification limit reached (${maxPerDay} per day). This limit resets at midnight. Please try again tomorrow.`,
    };
  },
  notConfigured(details?: string): LookupError {
    return {
      code: 'not_configured',
      message: 'Ingredient finder is not configured. Please contact support.',
      details,
    };
  },
  invalidResponse(details?: string): LookupError {
    return {
      code: 'invalid_response',
      message: 'Invalid response from server. Please try again.',
      details,
    };
  },
  serverError(statusCode: number): LookupError {
    return {
      code: 'server_error',
      statusCode,
      message: `Server error (${statusCode}). Please try again later.`,
    };
  },
  networkError(details?: string): LookupError {
    return {
      code: 'network_error',
      message: 'Network error. Please check your connection and try again.',
      details,
    };
  },
  noIngredientsFound(): LookupError {
    return {
      code: 'no_ingredients_found',
      message: 'No ingredients found from trusted sources. Try entering them manually.',
    };
  },
  invalidRequest(message: string): LookupError {
    return { code: 'invalid_request', message };
  },
} as const;
