import { NotFoundError } from '../store/index.js';

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function jsonResult(data: unknown) {
  return textResult(JSON.stringify(data, null, 2));
}

export function errorResult(text: string) {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

/** Error result for a failed tool call. Not-found errors keep their own message. */
export function failure(action: string, error: unknown) {
  if (error instanceof NotFoundError) {
    return errorResult(error.message);
  }
  return errorResult(`Error ${action}: ${error instanceof Error ? error.message : String(error)}`);
}
