/**
 * Normalizes generated ABC text into something the parser accepts.
 *
 * Never fails: lines it does not recognize pass through unchanged. Whether
 * anything playable is left is for the part builder to decide.
 */

export const HEADER_PREFIXES = ['M:', 'L:', 'K:', 'X:', 'T:', 'V:', '%%'] as const;

const ALTERNATE_FLAT = '_';
const CANONICAL_FLAT = 'b';

export function isHeaderLine(line: string): boolean {
  return HEADER_PREFIXES.some(prefix => line.startsWith(prefix));
}

/** Rewrites every `[V:...]` section tag line to a single voice-1 header. */
export function collapseVoiceTags(text: string): string {
  return text
    .split('\n')
    .map(line => (line.trim().startsWith('[V:') ? 'V:1' : line))
    .join('\n');
}

function closeBars(line: string): string {
  if (isHeaderLine(line) || !line.includes('|')) return line;
  let out = line;
  if (!out.startsWith('|')) out = '|' + out;
  if (!out.endsWith('|')) out = out + '|';
  return out;
}

/** Repeat shorthand becomes a plain bar; "::|" needs more than one pass. */
function dropRepeatShorthand(text: string): string {
  let out = text;
  while (out.includes(':|') || out.includes('|:')) {
    out = out.split(':|').join('|').split('|:').join('|');
  }
  return out;
}

export function sanitizeNotation(raw: string): string {
  const text = collapseVoiceTags(raw).split(ALTERNATE_FLAT).join(CANONICAL_FLAT);
  const lines = text
    .trim()
    .split('\n')
    .map(line => closeBars(line.trim()));
  return dropRepeatShorthand(lines.join('\n'));
}
