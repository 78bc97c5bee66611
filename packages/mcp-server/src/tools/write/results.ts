/**
 * MCP result helpers shared by the vault tools
 */

import { InvalidConfigError, isVaultWeaveError } from '../../core/shared/errors.js';
import { serverLog } from '../../core/shared/serverLog.js';

/**
 * MCP response format
 */
export type McpResponse = {
  content: [{ type: 'text'; text: string }];
  isError?: boolean;
};

export interface ErrorPayload {
  success: false;
  code: string;
  message: string;
  issues?: string[];
}

export function jsonResult(payload: unknown): McpResponse {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

/**
 * Map a thrown error to an error result. Typed errors keep their code;
 * anything else is reported as INTERNAL_ERROR and logged.
 */
export function errorResult(err: unknown): McpResponse {
  let payload: ErrorPayload;
  if (isVaultWeaveError(err)) {
    payload = { success: false, code: err.code, message: err.message };
    if (err instanceof InvalidConfigError) {
      payload.issues = err.issues;
    }
  } else {
    const message = err instanceof Error ? err.message : String(err);
    serverLog('server', `Unexpected tool failure: ${message}`, 'error');
    payload = { success: false, code: 'INTERNAL_ERROR', message };
  }
  return { ...jsonResult(payload), isError: true };
}
