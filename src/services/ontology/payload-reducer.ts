/**
 * Payload Reducer
 *
 * Bounds an arbitrary JSON value before it is embedded in an extraction
 * prompt. This is sampling, not summarising: oversized mappings keep their
 * first keys, oversized lists their first items, and whatever still exceeds
 * the hard cap is cut as text (possibly mid-token).
 *
 * @module services/ontology/payload-reducer
 */

export interface ReductionConfig {
  /** Serialized length above which the value is sampled */
  threshold: number;
  /** Serialized length the final text never exceeds */
  hardCap: number;
}

export const DEFAULT_REDUCTION_CONFIG: ReductionConfig = {
  threshold: 2000,
  hardCap: 1500,
};

/** Keys kept from an oversized mapping */
export const SAMPLE_KEY_LIMIT = 3;
/** Items kept from a list value inside a sampled mapping */
export const SAMPLE_NESTED_ITEM_LIMIT = 2;
/** Items kept from an oversized top-level list */
export const SAMPLE_LIST_LIMIT = 3;

export interface ReducedPayload {
  /** Text to embed in the prompt; length <= hardCap */
  text: string;
  /** The value `text` was serialized from (the input itself when not sampled) */
  value: unknown;
  /** Serialized length of the input */
  originalLength: number;
  sampled: boolean;
  truncated: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Two-space indented JSON. `undefined` and functions serialize as "null".
 */
export function serializePayload(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? 'null';
}

/**
 * Representative sample of a value: first keys of a mapping (with nested
 * lists shortened) or first items of a list. Scalars come back unchanged.
 */
export function samplePayload(value: unknown): unknown {
  if (isPlainObject(value)) {
    const sample: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value).slice(0, SAMPLE_KEY_LIMIT)) {
      sample[key] =
        Array.isArray(nested) && nested.length > SAMPLE_NESTED_ITEM_LIMIT
          ? nested.slice(0, SAMPLE_NESTED_ITEM_LIMIT)
          : nested;
    }
    return sample;
  }

  if (Array.isArray(value)) {
    return value.slice(0, SAMPLE_LIST_LIMIT);
  }

  return value;
}

/**
 * Cut text to at most `cap` UTF-16 units without splitting a surrogate pair
 */
export function truncateText(text: string, cap: number): string {
  if (text.length <= cap) return text;
  let cut = Math.max(0, cap);
  if (cut > 0) {
    const last = text.charCodeAt(cut - 1);
    if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
  }
  return text.slice(0, cut);
}

/**
 * Reduce a JSON value to prompt-sized text
 */
export function reducePayload(
  value: unknown,
  config: ReductionConfig = DEFAULT_REDUCTION_CONFIG
): ReducedPayload {
  const original = serializePayload(value);
  let reducedValue = value;
  let text = original;
  let sampled = false;

  if (original.length > config.threshold && (isPlainObject(value) || Array.isArray(value))) {
    reducedValue = samplePayload(value);
    text = serializePayload(reducedValue);
    sampled = true;
  }

  const capped = truncateText(text, config.hardCap);

  return {
    text: capped,
    value: reducedValue,
    originalLength: original.length,
    sampled,
    truncated: capped.length < text.length,
  };
}
