// Pulls the JSON object out of a model reply before schema validation.
import { errorMessage } from '@/services/errors';

export type ModelJson = { ok: true; value: Record<string, unknown> } | { ok: false; reason: string };

const FENCE = /```[\w-]*[ \t]*\n([\s\S]*?)\n?```/;

/** Body of the first fenced block, or the text itself when there is none. */
export function stripCodeFence(text: string): string {
  const match = FENCE.exec(text);
  return (match?.[1] ?? text).trim();
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the outermost `{...}` of a reply, which tolerates a sentence of prose
 * around the object. Quotes are left alone: apostrophes in values are legal JSON.
 */
export function parseModelJson(raw: string): ModelJson {
  const text = stripCodeFence(raw.trim());
  if (!text) return { ok: false, reason: 'empty output' };

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return { ok: false, reason: 'no JSON object found' };

  let value: unknown;
  try {
    value = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(err)}` };
  }
  return isJsonObject(value) ? { ok: true, value } : { ok: false, reason: 'not a JSON object' };
}
