/**
 * Line-indexed checklist scanner.
 *
 * Fenced code regions are separated out before anything is matched, so
 * examples inside ``` blocks never count as checklist items, evidence
 * references or keyword hits. Inline `code` spans never count as keyword
 * hits either.
 */

export interface Line {
  /** 1-based */
  number: number;
  text: string;
}

export interface Span {
  startLine: number;
  endLine: number;
}

export interface ScannedLine extends Line {
  fenced: boolean;
}

export interface EvidenceRef {
  raw: string;
  line: number;
}

export interface ScannedItem {
  itemId: string;
  /** true when the id came from the text itself, false for the `line-<n>` fallback */
  stableId: boolean;
  line: number;
  checked: boolean;
  text: string;
  refs: EvidenceRef[];
  /** last line of the lookahead window */
  windowEnd: number;
}

export const DEFAULT_LOOKAHEAD = 5;

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const ITEM_RE = /^\s*(?:[-*+]|\d+[.)])\s+\[([ xX])\]\s?(.*)$/;
const ID_COMMENT_RE = /<!--\s*id:\s*([A-Za-z0-9][\w.-]*)\s*-->/;
const LEADING_ID_RE =
  /^(?:\*\*)?([A-Z][A-Z0-9]*-[0-9][\w.]*)(?:\*\*)?(?:[:)]\s*|\s+|$)|^(?:\*\*)?([A-Z][0-9]+(?:\.[0-9]+)*)(?:\*\*)?[:)]\s*/;
const EVIDENCE_RE = /<!--\s*evidence:\s*([^\s>]*)\s*-->/g;
const INLINE_CODE_RE = /(`+)(.+?)\1/g;

export function readLines(text: string): Line[] {
  return text.split(/\r?\n/).map((t, i) => ({ number: i + 1, text: t }));
}

interface Fence {
  char: string;
  length: number;
}

/**
 * Marks every line that belongs to a fenced block (fence lines included).
 * Fences nest: inside a block, a fence with an info string opens a deeper
 * level; a bare fence of the same character, at least as long as the
 * innermost opener, closes it.
 */
export function scanLines(text: string): ScannedLine[] {
  const stack: Fence[] = [];
  return readLines(text).map((line) => {
    const m = FENCE_RE.exec(line.text);
    if (!m) return { ...line, fenced: stack.length > 0 };

    const marker = m[1] ?? '';
    const info = (m[2] ?? '').trim();
    const fence: Fence = { char: marker.charAt(0), length: marker.length };
    const top = stack[stack.length - 1];

    if (!top) {
      stack.push(fence);
    } else if (info === '' && fence.char === top.char && fence.length >= top.length) {
      stack.pop();
    } else if (info !== '') {
      stack.push(fence);
    }
    return { ...line, fenced: true };
  });
}

/** Fenced regions as ignored spans; everything else is visible. */
export function splitSpans(text: string): { visible: Line[]; ignored: Span[] } {
  const visible: Line[] = [];
  const ignored: Span[] = [];
  let open: Span | null = null;

  for (const line of scanLines(text)) {
    if (line.fenced) {
      if (open) open.endLine = line.number;
      else open = { startLine: line.number, endLine: line.number };
    } else {
      if (open) {
        ignored.push(open);
        open = null;
      }
      visible.push({ number: line.number, text: line.text });
    }
  }
  if (open) ignored.push(open);
  return { visible, ignored };
}

function extractId(body: string, lineNumber: number): { itemId: string; stableId: boolean; text: string } {
  const comment = ID_COMMENT_RE.exec(body);
  if (comment?.[1]) {
    return { itemId: comment[1], stableId: true, text: body.replace(ID_COMMENT_RE, '') };
  }
  const leading = LEADING_ID_RE.exec(body);
  const leadingId = leading?.[1] ?? leading?.[2];
  if (leading && leadingId) {
    return { itemId: leadingId, stableId: true, text: body.slice(leading[0].length) };
  }
  return { itemId: `line-${lineNumber}`, stableId: false, text: body };
}

function stripComments(text: string): string {
  return text.replace(/<!--[\s\S]*?-->/g, '').trim();
}

function evidenceRefs(line: Line): EvidenceRef[] {
  const refs: EvidenceRef[] = [];
  for (const m of line.text.matchAll(EVIDENCE_RE)) {
    refs.push({ raw: m[1] ?? '', line: line.number });
  }
  return refs;
}

/**
 * Checklist items outside fenced code. Evidence references are collected
 * from a bounded window: the item's own line and up to `lookahead` lines
 * after it, stopping early at the next checklist item. Fenced lines inside
 * the window are skipped.
 */
export function scanChecklist(text: string, opts: { lookahead?: number } = {}): ScannedItem[] {
  const lookahead = opts.lookahead ?? DEFAULT_LOOKAHEAD;
  const lines = scanLines(text);
  const itemAt = lines.map((l) => (l.fenced ? null : ITEM_RE.exec(l.text)));

  const items: ScannedItem[] = [];
  lines.forEach((line, idx) => {
    const m = itemAt[idx];
    if (!m) return;

    const window: ScannedLine[] = [line];
    for (const next of lines.slice(idx + 1, idx + 1 + lookahead)) {
      if (itemAt[next.number - 1]) break;
      window.push(next);
    }

    const { itemId, stableId, text: body } = extractId(m[2] ?? '', line.number);
    items.push({
      itemId,
      stableId,
      line: line.number,
      checked: (m[1] ?? ' ').toLowerCase() === 'x',
      text: stripComments(body),
      refs: window.filter((l) => !l.fenced).flatMap(evidenceRefs),
      windowEnd: window[window.length - 1]?.number ?? line.number
    });
  });
  return items;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keyword: string): RegExp {
  // word boundaries only where the keyword itself starts/ends with a word character
  const start = /^\w/.test(keyword) ? '\\b' : '';
  const end = /\w$/.test(keyword) ? '\\b' : '';
  return new RegExp(`${start}${escapeRegExp(keyword)}${end}`, 'i');
}

/** Blanks out inline code spans, keeping the rest of the line in place. */
export function stripInlineCode(line: string): string {
  return line.replace(INLINE_CODE_RE, (span) => ' '.repeat(span.length));
}

/** Visible line numbers that mention `keyword` outside fenced and inline code. */
export function keywordLines(text: string, keyword: string): number[] {
  if (keyword.trim() === '') return [];
  const re = keywordPattern(keyword);
  return splitSpans(text)
    .visible.filter((l) => re.test(stripInlineCode(l.text)))
    .map((l) => l.number);
}

/**
 * Whether the checklist item `itemId`, or the visible text in its lookahead
 * window, mentions `keyword`.
 */
export function addressesKeyword(
  text: string,
  itemId: string,
  keyword: string,
  opts: { lookahead?: number } = {}
): boolean {
  const item = scanChecklist(text, opts).find((i) => i.itemId === itemId);
  if (!item) return false;
  return keywordLines(text, keyword).some((n) => n >= item.line && n <= item.windowEnd);
}
