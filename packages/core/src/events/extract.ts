import type { EventPart, FunctionResponsePart } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap a tool response: "output" first, then "result", then the raw value
 */
export function unwrapFunctionResponse(response: unknown): unknown {
  if (isRecord(response)) {
    if ('output' in response) {
      return response.output;
    }
    if ('result' in response) {
      return response.result;
    }
  }
  return response;
}

function responseToText(part: FunctionResponsePart): string {
  const value = unwrapFunctionResponse(part.response);
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      // Circular structures have no canonical form
      return '';
    }
  }
  return String(value);
}

/**
 * Human-readable text of an event's parts.
 *
 * Direct text wins; otherwise the first function response is unwrapped and
 * stringified. Anything else yields an empty string.
 */
export function extractEventText(parts: readonly EventPart[] | undefined): string {
  if (!parts) {
    return '';
  }

  for (const part of parts) {
    if (part.kind === 'text' && part.text) {
      return part.text;
    }
  }

  for (const part of parts) {
    if (part.kind === 'function-response' && part.response !== undefined && part.response !== null) {
      return responseToText(part);
    }
  }

  return '';
}
