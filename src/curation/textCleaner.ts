// Markup → plain text for feed summaries

const TAG_PATTERN = /<[^>]*>/g;

// After decoding, only tag-shaped text counts as markup so `a < b and c > d` survives
const DECODED_TAG_PATTERN = /<\/?[a-zA-Z!][^>]*>/g;

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'"
};

const ENTITY_PATTERN = /&(?:nbsp|amp|lt|gt|quot|#39);/g;

// Double-encoded input (&amp;lt;) needs more than one pass
const MAX_PASSES = 5;

function decodeEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, entity => ENTITIES[entity] ?? entity);
}

/**
 * Strip tags, decode the common entities, collapse whitespace.
 * Decoding can surface new tags or entities (&lt;b&gt;), so the strip/decode
 * pair repeats until the text stops changing. Decoded comparison signs are kept.
 */
export function cleanText(markup?: string | null): string {
  if (!markup) return '';

  let text = markup;
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = decodeEntities(text.replace(pass === 0 ? TAG_PATTERN : DECODED_TAG_PATTERN, ' '));
    if (next === text) break;
    text = next;
  }

  // Anything still left after the pass limit is dropped rather than emitted encoded
  text = text.replace(DECODED_TAG_PATTERN, ' ').replace(ENTITY_PATTERN, ' ');

  return text
    .replace(/[\u200B-\u200D\uFEFF]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}
