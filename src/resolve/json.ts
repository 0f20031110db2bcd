import { UpstreamFormatError, err, errorMessage, ok, type Result } from '../errors.js';

/**
 * Pulls a JSON value out of a chat response: drops `//` comment lines and
 * Markdown code fences before decoding.
 */
export function decodeJsonResponse(text: string): Result<unknown, UpstreamFormatError> {
  const cleaned = text
    .split('\n')
    .filter(line => !line.trim().startsWith('//') && !line.trim().startsWith('```'))
    .join('\n')
    .trim();
  try {
    const value: unknown = JSON.parse(cleaned);
    return ok(value);
  } catch (e) {
    return err(new UpstreamFormatError(`Invalid JSON response: ${errorMessage(e)}`, { cause: e }));
  }
}
