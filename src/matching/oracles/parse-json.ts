import { MalformedOracleResponseError } from '../matching.errors';

/**
 * Pulls the first JSON object out of a model response. Models sometimes
 * wrap the object in prose or code fences even in JSON mode.
 */
export function parseJsonObject(responseText: string | null | undefined): unknown {
  const text = responseText?.trim() ?? '';
  if (!text) {
    throw new MalformedOracleResponseError('Oracle returned an empty response');
  }

  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new MalformedOracleResponseError('No JSON object found in response');
  }

  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedOracleResponseError(`Invalid JSON in response: ${message}`, {
      cause: error,
    });
  }
}
