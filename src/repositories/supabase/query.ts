import type { PostgrestError } from '@supabase/supabase-js';
import { UpstreamError } from '../../utils/errors';

export function throwIfError(error: PostgrestError | null, action: string): void {
  if (error) {
    throw new UpstreamError(`${action} failed: ${error.message}`, { code: error.code });
  }
}

// Expects the row written by insert/update ... select().single()
export function requireRow<T>(data: T | null, error: PostgrestError | null, action: string): T {
  throwIfError(error, action);
  if (data === null) {
    throw new UpstreamError(`${action} returned no row`);
  }
  return data;
}
