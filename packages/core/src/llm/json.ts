/**
 * Extract a JSON object from a model response that may be wrapped in
 * markdown code fences or prefixed with explanatory text.
 */
export function extractJson(raw: string): unknown {
  const cleaned = raw.replace(/```(?:json)?\s*\n?/gi, '').replace(/```/g, '').trim();

  try { return JSON.parse(cleaned); } catch { /* fall through */ }

  const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON object found in response');
  }
  return JSON.parse(jsonMatch[0]);
}
